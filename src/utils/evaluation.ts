/**
 * Expression Evaluation
 *
 * Computes the numeric value of a tree, with optional variable bindings.
 */

import type { ExprNode } from '../types/index.js';
import {
    createInvalidOperatorError,
    createMalformedInputError,
    createUnboundVariableError,
    isOperatorSymbol,
} from '../types/index.js';
import { applyOperator, parseNumber } from '../arithmetic.js';

export type Bindings = Record<string, number> | Map<string, number>;

function lookup(bindings: Bindings, name: string): number | undefined {
    if (bindings instanceof Map) {
        return bindings.get(name);
    }
    return Object.prototype.hasOwnProperty.call(bindings, name) ? bindings[name] : undefined;
}

/**
 * Evaluate a tree under the given variable bindings
 */
export function evaluate(node: ExprNode, bindings: Bindings = {}): number {
    switch (node.type) {
        case 'number': {
            const value = parseNumber(node.value);
            if (value === null) {
                throw createMalformedInputError(`Leaf '${node.value}' is not a numeric literal`, node.value);
            }
            return value;
        }
        case 'variable': {
            const value = lookup(bindings, node.value);
            if (value === undefined) {
                throw createUnboundVariableError(node.value);
            }
            return value;
        }
        case 'operator': {
            if (!isOperatorSymbol(node.value)) {
                throw createInvalidOperatorError(node.value);
            }
            const left = evaluate(node.left, bindings);
            const right = evaluate(node.right, bindings);
            return applyOperator(node.value, left, right);
        }
    }
}
