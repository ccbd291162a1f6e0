/**
 * Shared type definitions for binop-ast
 */

// Re-export error types
export {
    ExpressionException,
    getSuggestion,
    createMalformedInputError,
    createInvalidOperatorError,
    createFoldingError,
    createUnboundVariableError,
    createIOError,
    serializeExpressionError,
    createGenericError,
} from './errors.js';

export type {
    ExpressionErrorCode,
    ErrorSpan,
    ExpressionError,
} from './errors.js';

// Re-export AST types
export {
    OPERATOR_SYMBOLS,
    isOperatorSymbol,
} from './ast.js';

export type {
    OperatorSymbol,
    ExprNodeType,
    NumberNode,
    VariableNode,
    OperatorNode,
    LeafNode,
    ExprNode,
} from './ast.js';

// Re-export parser types
export type {
    TokenType,
    Token,
} from './parser.js';

// Re-export response types
export { NOTATIONS } from './responses.js';

export type {
    Verbosity,
    Notation,
    SimplifyStep,
    SimplifyRuleName,
    MinimalSimplifyResponse,
    StandardSimplifyResponse,
    DetailedSimplifyResponse,
    SimplifyResponse,
    ParseResponse,
    RenderResponse,
    EvaluateResponse,
} from './responses.js';

// Re-export options
export {
    DEFAULTS
} from './options.js';

export type {
    OperatorPolicy,
    BuildOptions,
    SimplifyOptions,
    ExpressionOptions,
} from './options.js';
