/**
 * Structured Error System for binop-ast
 *
 * Provides machine-readable errors with codes, spans, and suggestions.
 */

/**
 * Error codes for expression operations
 */
export type ExpressionErrorCode =
  | 'MALFORMED_INPUT'       // Token stream does not form exactly one tree
  | 'INVALID_OPERATOR'      // Non-numeric token outside the operator set
  | 'FOLDING_ERROR'         // Arithmetic undefined for the operands (e.g. x / 0)
  | 'UNBOUND_VARIABLE'      // Evaluation reached a variable with no binding
  | 'INVALID_ARGUMENT'      // Tool or CLI arguments failed validation
  | 'UNKNOWN_TOOL'          // MCP call for a tool that does not exist
  | 'IO_ERROR';             // Test bench files could not be read

/**
 * Source location span for error reporting
 */
export interface ErrorSpan {
  start: number;
  end: number;
}

/**
 * Structured error with code, message, span, and suggestions
 */
export interface ExpressionError {
  code: ExpressionErrorCode;
  message: string;
  span?: ErrorSpan;
  suggestion?: string;
  context?: string;          // The problematic expression
  details?: Record<string, unknown>;
}

/**
 * Exception class wrapping ExpressionError for throw/catch patterns
 */
export class ExpressionException extends Error {
  public readonly error: ExpressionError;

  constructor(error: ExpressionError) {
    super(error.message);
    this.name = 'ExpressionException';
    this.error = error;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ExpressionException);
    }
  }

  get code(): ExpressionErrorCode {
    return this.error.code;
  }

  /**
   * Serialize error for MCP response
   */
  toJSON(): ExpressionError {
    return this.error;
  }
}

/**
 * Common input mistakes and their suggestions
 */
const SYNTAX_SUGGESTIONS: Array<{
  pattern: RegExp;
  suggestion: string;
}> = [
    {
      pattern: /^\s*$/,
      suggestion: 'Expression is empty - provide at least one number'
    },
    {
      pattern: /[()]/,
      suggestion: 'Parentheses are not used in prefix notation - remove them'
    },
    {
      pattern: /,/,
      suggestion: 'Separate tokens with whitespace, not commas'
    },
    {
      pattern: /\d[+\-*/]|[+*/]\d/,
      suggestion: 'Separate every operator and number with whitespace (e.g. "+ 1 2")'
    },
    {
      pattern: /(^|\s)[+\-*/]\s*$/,
      suggestion: 'Expression ends with an operator - each operator needs two operands after it'
    },
    {
      pattern: /\^|%/,
      suggestion: "Only '+', '-', '*' and '/' are supported operators"
    },
  ];

/**
 * Get a suggestion for a malformed expression based on the input
 */
export function getSuggestion(input: string): string | undefined {
  for (const { pattern, suggestion } of SYNTAX_SUGGESTIONS) {
    if (pattern.test(input)) {
      return suggestion;
    }
  }
  return undefined;
}

/**
 * Create a malformed input error with optional span and suggestion
 */
export function createMalformedInputError(
  message: string,
  input?: string,
  position?: number,
  details?: Record<string, unknown>
): ExpressionException {
  return new ExpressionException({
    code: 'MALFORMED_INPUT',
    message,
    span: position !== undefined ? { start: position, end: position + 1 } : undefined,
    suggestion: input !== undefined
      ? getSuggestion(input) ?? 'Each operator needs exactly two operands after it'
      : 'Each operator needs exactly two operands after it',
    context: input,
    details,
  });
}

/**
 * Create an invalid operator error
 */
export function createInvalidOperatorError(
  operator: string,
  input?: string,
  position?: number
): ExpressionException {
  return new ExpressionException({
    code: 'INVALID_OPERATOR',
    message: `Unsupported operator '${operator}'`,
    span: position !== undefined ? { start: position, end: position + operator.length } : undefined,
    suggestion: "Use one of '+', '-', '*', '/' or build with the passthrough operator policy",
    context: input,
    details: { operator },
  });
}

/**
 * Create a folding error (arithmetic undefined over the operands)
 */
export function createFoldingError(
  message: string,
  context?: string,
  details?: Record<string, unknown>
): ExpressionException {
  return new ExpressionException({
    code: 'FOLDING_ERROR',
    message,
    suggestion: 'Disable constant folding or skip folding errors to keep the node unfolded',
    context,
    details,
  });
}

/**
 * Create an unbound variable error
 */
export function createUnboundVariableError(name: string): ExpressionException {
  return new ExpressionException({
    code: 'UNBOUND_VARIABLE',
    message: `Variable '${name}' has no binding`,
    suggestion: `Provide a numeric value for '${name}' in the bindings`,
    details: { variable: name },
  });
}

/**
 * Create an I/O error for test bench loading
 */
export function createIOError(
  message: string,
  details?: Record<string, unknown>
): ExpressionException {
  return new ExpressionException({
    code: 'IO_ERROR',
    message,
    details,
  });
}

/**
 * Serialize an ExpressionError for JSON output
 */
export function serializeExpressionError(error: ExpressionError): object {
  return {
    code: error.code,
    message: error.message,
    ...(error.span && { span: error.span }),
    ...(error.suggestion && { suggestion: error.suggestion }),
    ...(error.context !== undefined && { context: error.context }),
    ...(error.details && { details: error.details }),
  };
}

/**
 * Create a generic expression error exception.
 * Use this when no specific factory is available.
 */
export function createGenericError(
  code: ExpressionErrorCode,
  message: string,
  details?: Record<string, unknown>
): ExpressionException {
  return new ExpressionException({
    code,
    message,
    details,
  });
}
