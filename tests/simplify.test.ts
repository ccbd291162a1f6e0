import { parse } from '../src/parser/index.js';
import { simplify, simplifyWithTrace } from '../src/transform/simplify.js';
import {
    additiveIdentity,
    constantFolding,
    multiplicationByZero,
    multiplicativeIdentity,
} from '../src/transform/rules.js';
import { createNumber, createOperator, createVariable, nodesEqual, toPrefix } from '../src/ast/index.js';
import { ExpressionException } from '../src/types/index.js';
import { FOLD_POLICIES, SCENARIOS, simplifyPrefix } from './fixtures.js';

describe('Simplification scenarios', () => {
    describe.each(FOLD_POLICIES)('$policy', ({ options, key }) => {
        test.each(SCENARIOS)('$name: $input', (scenario) => {
            expect(simplifyPrefix(scenario.input, options)).toBe(scenario[key]);
        });
    });

    test('folding is on by default', () => {
        expect(simplifyPrefix('+ 1 + 2 0')).toBe('3');
    });
});

describe('Rules', () => {
    const x = createVariable('x');
    const zero = createNumber(0);
    const one = createNumber(1);

    test('additive identity returns the other operand itself', () => {
        expect(additiveIdentity(createOperator('+', x, zero))).toBe(x);
        expect(additiveIdentity(createOperator('+', zero, x))).toBe(x);
        expect(additiveIdentity(createOperator('*', x, zero))).toBeNull();
        expect(additiveIdentity(createOperator('+', x, one))).toBeNull();
    });

    test('multiplicative identity returns the other operand itself', () => {
        expect(multiplicativeIdentity(createOperator('*', x, one))).toBe(x);
        expect(multiplicativeIdentity(createOperator('*', one, x))).toBe(x);
        expect(multiplicativeIdentity(createOperator('+', x, one))).toBeNull();
    });

    test('multiplication by zero yields a fresh zero leaf', () => {
        const result = multiplicationByZero(createOperator('*', x, zero));
        expect(result).toEqual(createNumber(0));
        expect(result).not.toBe(zero);
        expect(multiplicationByZero(createOperator('*', zero, x))).toEqual(createNumber(0));
        expect(multiplicationByZero(createOperator('-', x, zero))).toBeNull();
    });

    test('rules only inspect immediate children', () => {
        const tree = parse('* 2 + 0 1');
        if (tree.type !== 'operator') throw new Error('expected operator root');
        expect(multiplicativeIdentity(tree)).toBeNull();
        expect(simplifyPrefix('* 2 + 0 1', { fold: false })).toBe('2');
    });

    test('identity literals are compared numerically', () => {
        expect(simplifyPrefix('+ 00 5', { fold: false })).toBe('5');
        expect(simplifyPrefix('* 7 1.0', { fold: false })).toBe('7');
    });

    test('constant folding respects the fold option', () => {
        const node = createOperator('+', createNumber(1), createNumber(1));
        expect(constantFolding(node, {})).toEqual(createNumber(2));
        expect(constantFolding(node, { fold: false })).toBeNull();
    });
});

describe('Constant folding', () => {
    test('folds every supported operator', () => {
        expect(simplifyPrefix('+ 1 1')).toBe('2');
        expect(simplifyPrefix('- 1 2')).toBe('-1');
        expect(simplifyPrefix('* 4 5')).toBe('20');
        expect(simplifyPrefix('/ 6 3')).toBe('2');
        expect(simplifyPrefix('/ 1 2')).toBe('0.5');
        expect(simplifyPrefix('+ 1.5 2')).toBe('3.5');
    });

    test('folds through nested nodes bottom-up', () => {
        expect(simplifyPrefix('* + 1 1 - 5 2')).toBe('6');
        expect(simplifyPrefix('* 0 + 1 1')).toBe('0');
    });

    test('does not fold when an operand is a variable', () => {
        expect(simplifyPrefix('+ x 1', { allowVariables: true })).toBe('+ x 1');
        expect(simplifyPrefix('+ x + 1 2', { allowVariables: true })).toBe('+ x 3');
    });

    test('does not fold passthrough operators', () => {
        expect(simplifyPrefix('^ 2 3', { operatorPolicy: 'passthrough' })).toBe('^ 2 3');
        expect(simplifyPrefix('+ ^ 2 3 0', { operatorPolicy: 'passthrough' })).toBe('^ 2 3');
    });

    test('division by zero is a folding error', () => {
        expect.assertions(3);
        expect(() => simplifyPrefix('/ 1 0')).toThrow(ExpressionException);
        try {
            simplifyPrefix('+ 2 / 1 0');
        } catch (e) {
            expect(e instanceof ExpressionException && e.code).toBe('FOLDING_ERROR');
            expect(e instanceof Error && e.message).toBe('Division by zero: 1 / 0');
        }
    });

    test('division by zero is left unfolded when skipping folding errors', () => {
        expect(simplifyPrefix('+ 2 / 1 0', { onFoldingError: 'skip' })).toBe('+ 2 / 1 0');
    });

    test('integer folding keeps every digit', () => {
        expect(simplifyPrefix('+ 9007199254740993 1')).toBe('9007199254740994');
        expect(simplifyPrefix('* 123456789 987654321')).toBe('121932631112635269');
        expect(simplifyPrefix('* 99999999999 99999999999')).toBe('9999999999800000000001');
        expect(simplifyPrefix('- 0 18446744073709551616')).toBe('-18446744073709551616');
        expect(simplifyPrefix('/ 18446744073709551616 4')).toBe('4611686018427387904');
    });

    test('results without an exact literal are left unfolded', () => {
        expect(simplifyPrefix('/ 1 10000000')).toBe('/ 1 10000000');
        expect(simplifyPrefix('/ 9007199254740993 2')).toBe('/ 9007199254740993 2');
        expect(simplifyPrefix('+ 0.5 9007199254740993')).toBe('+ 0.5 9007199254740993');
        expect(simplifyPrefix('* 2 / 1 10000000', { onFoldingError: 'throw' })).toBe('* 2 / 1 10000000');
    });

    test('division by zero is not an error without folding', () => {
        expect(simplifyPrefix('/ 1 0', { fold: false })).toBe('/ 1 0');
    });
});

describe('Algebraic laws', () => {
    const samples = ['7', '+ 2 3', '* x 4', '- 9 + x 0', '/ * y 1 - 3 3'];
    const options = { allowVariables: true, onFoldingError: 'skip' as const };

    describe.each(FOLD_POLICIES)('$policy', ({ options: foldOptions }) => {
        const opts = { ...options, ...foldOptions };
        const simplified = (input: string) => simplify(parse(input, opts), opts);

        test.each(samples)('identity laws hold for %s', (sample) => {
            const expected = simplified(sample);
            expect(simplified(`+ ${sample} 0`)).toEqual(expected);
            expect(simplified(`+ 0 ${sample}`)).toEqual(expected);
            expect(simplified(`* ${sample} 1`)).toEqual(expected);
            expect(simplified(`* 1 ${sample}`)).toEqual(expected);
        });

        test.each(samples)('annihilation holds for %s', (sample) => {
            expect(simplified(`* ${sample} 0`)).toEqual(createNumber(0));
            expect(simplified(`* 0 ${sample}`)).toEqual(createNumber(0));
        });

        test.each([...samples, '+ 1 + 2 0', '* + x 0 + 1 1'])('simplify is idempotent for %s', (sample) => {
            const once = simplified(sample);
            expect(nodesEqual(simplify(once, opts), once)).toBe(true);
        });
    });
});

describe('Simplifier contract', () => {
    test('a bare leaf simplifies to itself', () => {
        const leaf = createNumber(5);
        expect(simplify(leaf)).toBe(leaf);
    });

    test('an unchanged tree is returned as is', () => {
        const tree = parse('+ x 1', { allowVariables: true });
        expect(simplify(tree)).toBe(tree);
    });

    test('the input tree is not mutated', () => {
        const tree = parse('+ 1 * 0 1');
        simplify(tree);
        expect(toPrefix(tree)).toBe('+ 1 * 0 1');
    });

    test('multiplication by zero wins over folding on the same node', () => {
        const { steps } = simplifyWithTrace(parse('* 0 5'));
        expect(steps).toEqual([
            { rule: 'multiplication-by-zero', before: '* 0 5', after: '0' },
        ]);
    });

    test('trace lists rule applications bottom-up', () => {
        const { result, steps } = simplifyWithTrace(parse('+ 1 * 0 1'));
        expect(toPrefix(result)).toBe('1');
        expect(steps).toEqual([
            { rule: 'multiplicative-identity', before: '* 0 1', after: '0' },
            { rule: 'additive-identity', before: '+ 1 0', after: '1' },
        ]);
    });

    test('trace records folding after an exposed identity', () => {
        const { steps } = simplifyWithTrace(parse('+ 1 + 2 0'));
        expect(steps).toEqual([
            { rule: 'additive-identity', before: '+ 2 0', after: '2' },
            { rule: 'constant-folding', before: '+ 1 2', after: '3' },
        ]);
    });

    test('trace is empty when nothing applies', () => {
        expect(simplifyWithTrace(parse('- 3 x', { allowVariables: true })).steps).toEqual([]);
    });
});
