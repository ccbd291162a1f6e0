import type { ExprNode } from '../types/index.js';

/**
 * Structural equality: same shape, node types and values.
 * Values are compared as text, so `2` and `2.0` differ.
 */
export function nodesEqual(a: ExprNode, b: ExprNode): boolean {
    if (a.type !== b.type || a.value !== b.value) {
        return false;
    }
    if (a.type === 'operator' && b.type === 'operator') {
        return nodesEqual(a.left, b.left) && nodesEqual(a.right, b.right);
    }
    return true;
}
