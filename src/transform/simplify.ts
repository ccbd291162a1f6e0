import type { ExprNode, SimplifyOptions, SimplifyStep } from '../types/index.js';
import { toPrefix } from '../ast/printer.js';
import { RULES } from './rules.js';

export interface SimplifyResult {
    result: ExprNode;
    steps: SimplifyStep[];
}

/**
 * Simplify a tree bottom-up.
 *
 * Both children are fully simplified before the rules are tried on the node
 * rebuilt from them, so identities exposed by a child (e.g. `+ 2 0` becoming
 * `2`) are caught one level up in the same pass. Every rule returns an
 * already-simplified subtree, which makes a single pass sufficient.
 *
 * The input tree is never mutated.
 */
export function simplify(node: ExprNode, options: SimplifyOptions = {}): ExprNode {
    return simplifyNode(node, options);
}

/**
 * Like `simplify`, also recording each rule application in the order they fired.
 */
export function simplifyWithTrace(node: ExprNode, options: SimplifyOptions = {}): SimplifyResult {
    const steps: SimplifyStep[] = [];
    const result = simplifyNode(node, options, steps);
    return { result, steps };
}

function simplifyNode(node: ExprNode, options: SimplifyOptions, steps?: SimplifyStep[]): ExprNode {
    if (node.type !== 'operator') {
        return node;
    }

    const left = simplifyNode(node.left, options, steps);
    const right = simplifyNode(node.right, options, steps);
    const rebuilt = left === node.left && right === node.right
        ? node
        : { type: 'operator' as const, value: node.value, left, right };

    for (const rule of RULES) {
        const replacement = rule.apply(rebuilt, options);
        if (replacement !== null) {
            steps?.push({ rule: rule.name, before: toPrefix(rebuilt), after: toPrefix(replacement) });
            return replacement;
        }
    }

    return rebuilt;
}
