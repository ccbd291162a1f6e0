import { parse } from '../src/parser/index.js';
import { render, toInfix, toPostfix, toPrefix, toTreeString } from '../src/ast/printer.js';
import { countNodes, treeDepth, collectVariables, traverse } from '../src/ast/visitor.js';

describe('Renderer', () => {
    const tree = parse('* + 1 2 3');

    test('prefix puts the operator first', () => {
        expect(toPrefix(tree)).toBe('* + 1 2 3');
    });

    test('infix parenthesizes every operator node', () => {
        expect(toInfix(tree)).toBe('((1 + 2) * 3)');
        expect(toInfix(parse('+ 1 * 2 3'))).toBe('(1 + (2 * 3))');
    });

    test('postfix puts the operator last', () => {
        expect(toPostfix(tree)).toBe('1 2 + 3 *');
    });

    test('leaves render as their value in every notation', () => {
        const leaf = parse('42');
        expect(toPrefix(leaf)).toBe('42');
        expect(toInfix(leaf)).toBe('42');
        expect(toPostfix(leaf)).toBe('42');
    });

    test('tree view indents children two spaces per level', () => {
        expect(toTreeString(tree)).toBe('*\n  +\n    1\n    2\n  3');
    });

    test('render dispatches on notation', () => {
        expect(render(tree, 'prefix')).toBe('* + 1 2 3');
        expect(render(tree, 'infix')).toBe('((1 + 2) * 3)');
        expect(render(tree, 'postfix')).toBe('1 2 + 3 *');
        expect(render(tree, 'tree')).toBe(toTreeString(tree));
    });

    test('passthrough operators render unchanged', () => {
        const custom = parse('% 7 2', { operatorPolicy: 'passthrough' });
        expect(toInfix(custom)).toBe('(7 % 2)');
    });
});

describe('Tree utilities', () => {
    test('counts nodes and depth', () => {
        const tree = parse('+ 1 * 2 3');
        expect(countNodes(tree)).toBe(5);
        expect(treeDepth(tree)).toBe(3);
        expect(treeDepth(parse('9'))).toBe(1);
    });

    test('traverses in pre-order', () => {
        const seen: string[] = [];
        traverse(parse('- * 2 3 4'), (node) => seen.push(node.value));
        expect(seen).toEqual(['-', '*', '2', '3', '4']);
    });

    test('collects variables once each in order of appearance', () => {
        const tree = parse('+ * y x - x 2', { allowVariables: true });
        expect(collectVariables(tree)).toEqual(['y', 'x']);
    });
});
