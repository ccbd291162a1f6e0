import type { ExprNode, NumberNode, OperatorNode, VariableNode } from '../types/index.js';

export function createNumber(value: string | number): NumberNode {
    return { type: 'number', value: String(value) };
}

export function createVariable(name: string): VariableNode {
    return { type: 'variable', value: name };
}

export function createOperator(value: string, left: ExprNode, right: ExprNode): OperatorNode {
    return { type: 'operator', value, left, right };
}
