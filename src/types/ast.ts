/**
 * Expression Tree Types
 */

/**
 * Operator symbols with defined arithmetic.
 */
export type OperatorSymbol = '+' | '-' | '*' | '/';

export const OPERATOR_SYMBOLS: readonly OperatorSymbol[] = ['+', '-', '*', '/'];

export type ExprNodeType = 'number' | 'variable' | 'operator';

/**
 * Numeric literal, kept in its textual form
 */
export interface NumberNode {
    type: 'number';
    value: string;
}

/**
 * Symbolic leaf (only produced when variables are enabled)
 */
export interface VariableNode {
    type: 'variable';
    value: string;
}

/**
 * Binary operator with exactly two operands.
 * `value` is one of OPERATOR_SYMBOLS unless built with the passthrough policy.
 */
export interface OperatorNode {
    type: 'operator';
    value: string;
    left: ExprNode;
    right: ExprNode;
}

export type LeafNode = NumberNode | VariableNode;

export type ExprNode = LeafNode | OperatorNode;

export function isOperatorSymbol(value: string): value is OperatorSymbol {
    return (OPERATOR_SYMBOLS as readonly string[]).includes(value);
}
