import { isNotation, parseCliArgs, readExpressionLines, renderLine, simplifyLine } from '../src/commands.js';

describe('readExpressionLines', () => {
    test('drops blanks and comments and trims the rest', () => {
        const content = '# scenarios\n+ 1 2\n\n  % note\n  * 1 0  \n';
        expect(readExpressionLines(content)).toEqual(['+ 1 2', '* 1 0']);
    });
});

describe('simplifyLine', () => {
    test('returns the simplified form and its trace', () => {
        const outcome = simplifyLine('+ 1 * 0 1');
        expect(outcome).toEqual({
            ok: true,
            input: '+ 1 * 0 1',
            output: '1',
            steps: [
                { rule: 'multiplicative-identity', before: '* 0 1', after: '0' },
                { rule: 'additive-identity', before: '+ 1 0', after: '1' },
            ],
        });
    });

    test('renders in the requested notation', () => {
        const outcome = simplifyLine('* + x 0 + 1 1', { allowVariables: true }, 'infix');
        expect(outcome.ok && outcome.output).toBe('(x * 2)');
    });

    test('turns failures into outcomes with the error code', () => {
        expect(simplifyLine('+ 1')).toEqual({
            ok: false,
            input: '+ 1',
            error: "Unexpected end of input: operator '+' at position 0 is missing its right operand",
            code: 'MALFORMED_INPUT',
        });
    });
});

describe('renderLine', () => {
    test('renders prefix, infix and postfix by default', () => {
        expect(renderLine('* + 1 2 3')).toEqual({
            ok: true,
            input: '* + 1 2 3',
            outputs: {
                prefix: '* + 1 2 3',
                infix: '((1 + 2) * 3)',
                postfix: '1 2 + 3 *',
            },
        });
    });

    test('reports invalid operators', () => {
        const outcome = renderLine('^ 2 3');
        expect(outcome.ok).toBe(false);
        expect(!outcome.ok && outcome.code).toBe('INVALID_OPERATOR');
    });
});

describe('isNotation', () => {
    test('accepts only known notations', () => {
        expect(isNotation('tree')).toBe(true);
        expect(isNotation('json')).toBe(false);
    });
});

describe('parseCliArgs', () => {
    test('reads the notation in either form', () => {
        expect(parseCliArgs(['simplify', '--notation', 'tree', 'exprs.txt'])).toEqual({
            notation: 'tree',
            positional: ['simplify', 'exprs.txt'],
        });
        expect(parseCliArgs(['render', '--notation=infix', '--no-fold', 'exprs.txt'])).toEqual({
            notation: 'infix',
            positional: ['render', 'exprs.txt'],
        });
    });

    test('defaults to prefix', () => {
        expect(parseCliArgs(['repl']).notation).toBe('prefix');
    });

    test('reports a missing or unknown notation', () => {
        expect(parseCliArgs(['simplify', '--notation']).error).toBe('--notation requires a value');
        expect(parseCliArgs(['simplify', '--notation', 'json']).error).toBe(
            "Invalid notation 'json'. Valid options are: prefix, infix, postfix, tree"
        );
    });
});
