import type { ExprNode } from '../types/index.js';

/**
 * Generic pre-order visitor
 */
export function traverse(node: ExprNode, visitor: (node: ExprNode, depth: number) => void, depth: number = 0): void {
    visitor(node, depth);

    if (node.type === 'operator') {
        traverse(node.left, visitor, depth + 1);
        traverse(node.right, visitor, depth + 1);
    }
}

/**
 * Total number of nodes in the tree
 */
export function countNodes(node: ExprNode): number {
    let count = 0;
    traverse(node, () => { count++; });
    return count;
}

/**
 * Length of the longest root-to-leaf path, counted in nodes
 */
export function treeDepth(node: ExprNode): number {
    let max = 0;
    traverse(node, (_n, depth) => {
        if (depth + 1 > max) max = depth + 1;
    });
    return max;
}

/**
 * Names of all variables in the tree, in order of first appearance
 */
export function collectVariables(node: ExprNode): string[] {
    const seen = new Set<string>();
    traverse(node, (n) => {
        if (n.type === 'variable') seen.add(n.value);
    });
    return [...seen];
}
