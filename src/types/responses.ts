/**
 * Response types for binop-ast handlers
 */

/**
 * Verbosity level for responses
 */
export type Verbosity = 'minimal' | 'standard' | 'detailed';

export type Notation = 'prefix' | 'infix' | 'postfix' | 'tree';

export const NOTATIONS: readonly Notation[] = ['prefix', 'infix', 'postfix', 'tree'];

/**
 * One rule application recorded by the simplifier
 */
export interface SimplifyStep {
    rule: SimplifyRuleName;
    before: string;
    after: string;
}

export type SimplifyRuleName =
    | 'additive-identity'
    | 'multiplicative-identity'
    | 'multiplication-by-zero'
    | 'constant-folding';

/**
 * Minimal response - just the simplified prefix form
 */
export interface MinimalSimplifyResponse {
    success: boolean;
    prefix: string;
}

/**
 * Standard response - all three notations
 */
export interface StandardSimplifyResponse extends MinimalSimplifyResponse {
    infix: string;
    postfix: string;
    changed: boolean;
}

/**
 * Detailed response - includes the rule trace
 */
export interface DetailedSimplifyResponse extends StandardSimplifyResponse {
    original: string;
    steps: SimplifyStep[];
    statistics: {
        nodesBefore: number;
        nodesAfter: number;
        depthBefore: number;
        depthAfter: number;
    };
}

export type SimplifyResponse =
    | MinimalSimplifyResponse
    | StandardSimplifyResponse
    | DetailedSimplifyResponse;

export interface ParseResponse {
    success: boolean;
    prefix: string;
    infix: string;
    postfix: string;
    tree: string;
    nodeCount: number;
    depth: number;
}

export interface RenderResponse {
    success: boolean;
    notation: Notation;
    output: string;
}

export interface EvaluateResponse {
    success: boolean;
    value: number;
}
