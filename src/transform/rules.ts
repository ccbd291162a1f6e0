/**
 * Node-local simplification rules.
 *
 * Each rule inspects only an operator node and its immediate children and
 * returns the replacement, or null when it does not apply. Recursion into
 * the children is the job of `simplify`.
 */

import type { ExprNode, OperatorNode, SimplifyOptions, SimplifyRuleName } from '../types/index.js';
import { DEFAULTS, ExpressionException, isOperatorSymbol } from '../types/index.js';
import { foldLiterals, parseNumber } from '../arithmetic.js';
import { createNumber } from '../ast/factory.js';

export type Rule = (node: OperatorNode, options: SimplifyOptions) => ExprNode | null;

function isLiteral(node: ExprNode, value: number): boolean {
    return node.type === 'number' && parseNumber(node.value) === value;
}

/**
 * x + 0 = x, 0 + x = x
 */
export function additiveIdentity(node: OperatorNode): ExprNode | null {
    if (node.value !== '+') return null;
    if (isLiteral(node.left, 0)) return node.right;
    if (isLiteral(node.right, 0)) return node.left;
    return null;
}

/**
 * x * 1 = x, 1 * x = x
 */
export function multiplicativeIdentity(node: OperatorNode): ExprNode | null {
    if (node.value !== '*') return null;
    if (isLiteral(node.left, 1)) return node.right;
    if (isLiteral(node.right, 1)) return node.left;
    return null;
}

/**
 * x * 0 = 0, 0 * x = 0
 */
export function multiplicationByZero(node: OperatorNode): ExprNode | null {
    if (node.value !== '*') return null;
    if (isLiteral(node.left, 0) || isLiteral(node.right, 0)) {
        return createNumber(0);
    }
    return null;
}

/**
 * Evaluate an operator whose operands are both numeric literals.
 * Passthrough operators have no arithmetic and are left alone, and so is
 * a result that has no exact literal.
 */
export function constantFolding(node: OperatorNode, options: SimplifyOptions): ExprNode | null {
    if ((options.fold ?? DEFAULTS.fold) === false) return null;
    if (node.left.type !== 'number' || node.right.type !== 'number') return null;
    if (!isOperatorSymbol(node.value)) return null;

    try {
        // null: no exact literal for the result, leave the node as written
        const result = foldLiterals(node.value, node.left.value, node.right.value);
        return result === null ? null : createNumber(result);
    } catch (error) {
        if (error instanceof ExpressionException
            && error.code === 'FOLDING_ERROR'
            && (options.onFoldingError ?? DEFAULTS.onFoldingError) === 'skip') {
            return null;
        }
        throw error;
    }
}

/**
 * Rules in the order they are tried; the first match wins.
 */
export const RULES: ReadonlyArray<{ name: SimplifyRuleName; apply: Rule }> = [
    { name: 'additive-identity', apply: additiveIdentity },
    { name: 'multiplicative-identity', apply: multiplicativeIdentity },
    { name: 'multiplication-by-zero', apply: multiplicationByZero },
    { name: 'constant-folding', apply: constantFolding },
];
