/**
 * Arithmetic Support
 *
 * Numeric literal recognition and the arithmetic behind constant folding
 * and evaluation.
 *
 * Supported operators: +, -, *, /
 *
 * Literals are plain digit strings, optionally signed or with a decimal
 * part so that folded results (-1, 0.5) read back as numbers.
 */

import type { OperatorSymbol } from './types/index.js';
import { createFoldingError } from './types/index.js';

const NUMERIC_LITERAL = /^-?\d+(\.\d+)?$/;
const INTEGER_LITERAL = /^-?\d+$/;

/**
 * Check if a token looks like a number.
 */
export function isNumericLiteral(value: string): boolean {
    return NUMERIC_LITERAL.test(value);
}

/**
 * Parse a numeric literal from a string.
 */
export function parseNumber(value: string): number | null {
    if (!isNumericLiteral(value)) {
        return null;
    }
    return parseFloat(value);
}

/**
 * Format a computed value as a numeric literal, or null if it cannot be
 * written as one (NaN, Infinity, exponent notation).
 */
export function formatNumber(value: number): string | null {
    if (!Number.isFinite(value)) {
        return null;
    }
    // -0 prints as "0"
    const text = String(value === 0 ? 0 : value);
    return isNumericLiteral(text) ? text : null;
}

/**
 * Apply an operator to two numbers.
 * Throws FOLDING_ERROR on division by zero.
 */
export function applyOperator(op: OperatorSymbol, left: number, right: number): number {
    switch (op) {
        case '+':
            return left + right;
        case '-':
            return left - right;
        case '*':
            return left * right;
        case '/':
            if (right === 0) {
                throw divisionByZero(String(left), String(right));
            }
            return left / right;
    }
}

function divisionByZero(left: string, right: string) {
    return createFoldingError(`Division by zero: ${left} / ${right}`, `/ ${left} ${right}`, {
        operator: '/',
        left,
        right,
    });
}

/**
 * Fold two numeric literals into the literal of their result.
 *
 * Integer operands are combined with BigInt, so `+ - *` and exact integer
 * division never lose digits. Decimals and inexact quotients fall back to
 * floating point, but only while every integer involved is a safe integer.
 *
 * Returns null when the result cannot be computed exactly or written as a
 * literal (e.g. 1e-7). Throws FOLDING_ERROR on division by zero.
 */
export function foldLiterals(op: OperatorSymbol, left: string, right: string): string | null {
    if (INTEGER_LITERAL.test(left) && INTEGER_LITERAL.test(right)) {
        const a = BigInt(left);
        const b = BigInt(right);
        switch (op) {
            case '+':
                return (a + b).toString();
            case '-':
                return (a - b).toString();
            case '*':
                return (a * b).toString();
            case '/':
                if (b === 0n) {
                    throw divisionByZero(a.toString(), b.toString());
                }
                if (a % b === 0n) {
                    return (a / b).toString();
                }
        }
    }

    const a = parseNumber(left);
    const b = parseNumber(right);
    if (a === null || b === null || !isExactOperand(left, a) || !isExactOperand(right, b)) {
        return null;
    }

    const result = applyOperator(op, a, b);
    if (Number.isInteger(result) && !Number.isSafeInteger(result)) {
        return null;
    }
    return formatNumber(result);
}

function isExactOperand(literal: string, value: number): boolean {
    return !INTEGER_LITERAL.test(literal) || Number.isSafeInteger(value);
}
