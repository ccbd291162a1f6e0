/**
 * binop-ast - Library Entry Point
 *
 * Exports the expression tree core for use in other projects.
 * This file should NOT import @modelcontextprotocol/sdk or any other
 * server-specific dependencies.
 */

// Builder
export { parse, buildTree, buildCompleteTree, Builder, Tokenizer } from './parser/index.js';
export type { BuildResult } from './parser/index.js';

// Renderer and tree utilities
export * from './ast/index.js';

// Simplifier
export { simplify, simplifyWithTrace } from './transform/simplify.js';
export type { SimplifyResult } from './transform/simplify.js';
export {
    RULES,
    additiveIdentity,
    multiplicativeIdentity,
    multiplicationByZero,
    constantFolding,
} from './transform/rules.js';

// Evaluation
export { evaluate } from './utils/evaluation.js';
export type { Bindings } from './utils/evaluation.js';

// Validation and test bench
export { validateExpressions, SyntaxValidator } from './syntaxValidator.js';
export type { ValidationReport, ValidationResult, ExpressionResult } from './syntaxValidator.js';
export { loadTestbench, runTestbench } from './testbench.js';
export type { TestbenchCase, TestbenchCaseResult, TestbenchReport } from './testbench.js';

// Configuration
export { loadConfig, VERSION } from './config.js';
export type { Config } from './config.js';

// Types and Interfaces
export * from './types/index.js';
