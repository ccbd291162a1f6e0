import type { ExprNode, Notation } from '../types/index.js';

/**
 * Operator first: `+ 1 2`
 */
export function toPrefix(node: ExprNode): string {
    switch (node.type) {
        case 'number':
        case 'variable':
            return node.value;
        case 'operator':
            return `${node.value} ${toPrefix(node.left)} ${toPrefix(node.right)}`;
    }
}

/**
 * Fully parenthesized: `(1 + 2)`
 */
export function toInfix(node: ExprNode): string {
    switch (node.type) {
        case 'number':
        case 'variable':
            return node.value;
        case 'operator':
            return `(${toInfix(node.left)} ${node.value} ${toInfix(node.right)})`;
    }
}

/**
 * Operator last: `1 2 +`
 */
export function toPostfix(node: ExprNode): string {
    switch (node.type) {
        case 'number':
        case 'variable':
            return node.value;
        case 'operator':
            return `${toPostfix(node.left)} ${toPostfix(node.right)} ${node.value}`;
    }
}

/**
 * Indented view, one node per line, children two spaces deeper than their parent
 */
export function toTreeString(node: ExprNode, indent: number = 0): string {
    const line = '  '.repeat(indent) + node.value;
    if (node.type !== 'operator') {
        return line;
    }
    return [line, toTreeString(node.left, indent + 1), toTreeString(node.right, indent + 1)].join('\n');
}

export function render(node: ExprNode, notation: Notation): string {
    switch (notation) {
        case 'prefix':
            return toPrefix(node);
        case 'infix':
            return toInfix(node);
        case 'postfix':
            return toPostfix(node);
        case 'tree':
            return toTreeString(node);
    }
}
