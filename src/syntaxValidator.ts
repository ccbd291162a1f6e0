/**
 * Syntax Validator for prefix expressions
 *
 * Validates expressions using the builder and adds lint warnings.
 */

import type { BuildOptions, ExprNode } from './types/index.js';
import { DEFAULTS } from './types/index.js';
import { parse } from './parser/index.js';
import { Tokenizer } from './parser/tokenizer.js';
import { traverse } from './ast/visitor.js';
import { toPrefix } from './ast/printer.js';
import { parseNumber } from './arithmetic.js';

export interface ValidationResult {
    valid: boolean;
    errors: string[];
    warnings: string[];
}

export interface ExpressionResult extends ValidationResult {
    expression: string;
}

export interface ValidationReport {
    valid: boolean;
    expressionResults: ExpressionResult[];
}

/**
 * Syntax Validator for prefix expressions
 */
export class SyntaxValidator {
    private errors: string[] = [];
    private warnings: string[] = [];
    private options: BuildOptions;

    constructor(options: BuildOptions = {}) {
        this.options = options;
    }

    /**
     * Validate a single expression
     */
    validate(expression: string): ValidationResult {
        this.errors = [];
        this.warnings = [];

        let tree: ExprNode;
        try {
            tree = parse(expression, this.options);
        } catch (e) {
            this.errors.push(e instanceof Error ? e.message : String(e));
            this.checkArity(expression);
            return {
                valid: false,
                errors: [...this.errors],
                warnings: [...this.warnings]
            };
        }

        this.checkLiterals(tree);
        this.checkRedundantOperations(tree);

        return {
            valid: this.errors.length === 0,
            errors: [...this.errors],
            warnings: [...this.warnings]
        };
    }

    /**
     * A prefix expression with N binary operators has exactly N + 1 operands
     */
    private checkArity(expression: string): void {
        const tokens = new Tokenizer(expression).tokenize().filter(t => t.type !== 'EOF');
        const allowVariables = this.options.allowVariables ?? DEFAULTS.allowVariables;
        const operands = tokens.filter(t => t.type === 'NUMBER' || (allowVariables && t.type === 'IDENTIFIER')).length;
        const operators = tokens.length - operands;

        if (operands !== operators + 1) {
            this.warnings.push(
                `${operators} operator(s) need ${operators + 1} operand(s), found ${operands}`
            );
        }
    }

    /**
     * Numeric literals with leading zeros are accepted but read as decimal
     */
    private checkLiterals(tree: ExprNode): void {
        traverse(tree, (node) => {
            if (node.type === 'number' && /^-?0\d/.test(node.value)) {
                this.warnings.push(`Numeric literal '${node.value}' has leading zeros`);
            }
        });
    }

    /**
     * Flag operations that simplification removes or that cannot be folded
     */
    private checkRedundantOperations(tree: ExprNode): void {
        traverse(tree, (node) => {
            if (node.type !== 'operator') return;

            const left = node.left.type === 'number' ? parseNumber(node.left.value) : null;
            const right = node.right.type === 'number' ? parseNumber(node.right.value) : null;

            if (node.value === '+' && (left === 0 || right === 0)) {
                this.warnings.push(`Addition of zero in '${toPrefix(node)}' will be simplified away`);
            } else if (node.value === '*' && (left === 0 || right === 0)) {
                this.warnings.push(`Multiplication by zero in '${toPrefix(node)}' collapses to 0`);
            } else if (node.value === '*' && (left === 1 || right === 1)) {
                this.warnings.push(`Multiplication by one in '${toPrefix(node)}' will be simplified away`);
            } else if (node.value === '/' && right === 0) {
                this.warnings.push(`Division by literal zero cannot be folded`);
            }
        });
    }
}

/**
 * Validate a list of expressions
 */
export function validateExpressions(expressions: string[], options: BuildOptions = {}): ValidationReport {
    const validator = new SyntaxValidator(options);
    const results: ExpressionResult[] = [];
    let allValid = true;

    for (const expression of expressions) {
        const result = validator.validate(expression);
        results.push({
            expression,
            ...result
        });
        if (!result.valid) {
            allValid = false;
        }
    }

    return {
        valid: allValid,
        expressionResults: results
    };
}
