import type { Verbosity } from './responses.js';

/**
 * How non-numeric tokens are classified by the builder.
 * - strict: only + - * / are operators; anything else is INVALID_OPERATOR
 * - passthrough: any non-numeric token is an operator, rendered as-is and never folded
 */
export type OperatorPolicy = 'strict' | 'passthrough';

export interface BuildOptions {
    operatorPolicy?: OperatorPolicy;
    /** Accept identifiers as variable leaves */
    allowVariables?: boolean;
    /** Deepest nesting the builder accepts; the root is at depth 1 */
    maxDepth?: number;
}

export interface SimplifyOptions {
    /** Apply constant folding after the identity rules */
    fold?: boolean;
    /**
     * What to do when folding hits division by zero.
     * 'throw' raises FOLDING_ERROR, 'skip' leaves the node unfolded.
     */
    onFoldingError?: 'throw' | 'skip';
}

export interface ExpressionOptions extends BuildOptions, SimplifyOptions {
    verbosity?: Verbosity;
}

export const DEFAULTS = {
    operatorPolicy: 'strict',
    allowVariables: false,
    maxDepth: 1000,
    fold: true,
    onFoldingError: 'throw',
    verbosity: 'standard',
} as const;
