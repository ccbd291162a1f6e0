import type { BuildOptions, ExprNode, OperatorPolicy } from '../types/index.js';
import type { Token } from '../types/parser.js';
import {
    DEFAULTS,
    createInvalidOperatorError,
    createMalformedInputError,
    isOperatorSymbol,
} from '../types/index.js';

export interface BuildResult {
    root: ExprNode;
    /** Number of tokens (excluding EOF) the tree was built from */
    consumed: number;
}

/**
 * Builder for prefix-notation expression trees
 *
 * Grammar:
 *   expr     = NUMBER | VARIABLE | operator expr expr
 *   operator = '+' | '-' | '*' | '/'        (any symbol under passthrough)
 *
 * Tokens are consumed strictly left to right, in pre-order. Nesting beyond
 * `maxDepth` is rejected as malformed input.
 */
export class Builder {
    private tokens: Token[];
    private originalInput: string;
    private pos: number = 0;
    private operatorPolicy: OperatorPolicy;
    private allowVariables: boolean;
    private maxDepth: number;

    constructor(tokens: Token[], originalInput: string, options: BuildOptions = {}) {
        this.tokens = tokens;
        this.originalInput = originalInput;
        this.operatorPolicy = options.operatorPolicy ?? DEFAULTS.operatorPolicy;
        this.allowVariables = options.allowVariables ?? DEFAULTS.allowVariables;
        this.maxDepth = options.maxDepth ?? DEFAULTS.maxDepth;
    }

    /**
     * Build one tree from the front of the token stream.
     * Trailing tokens are left for the caller to inspect through `consumed`.
     */
    build(): BuildResult {
        const root = this.buildNode(1);
        return { root, consumed: this.pos };
    }

    /**
     * Build one tree and require that it uses every token.
     */
    buildComplete(): ExprNode {
        const { root, consumed } = this.build();
        if (this.current().type !== 'EOF') {
            const trailing = this.tokens.slice(consumed)
                .filter(t => t.type !== 'EOF')
                .map(t => t.value);
            throw createMalformedInputError(
                `Unexpected token '${this.current().value}' after complete expression`,
                this.originalInput,
                this.current().position,
                { consumed, trailing }
            );
        }
        return root;
    }

    private current(): Token {
        return this.tokens[this.pos] || { type: 'EOF', value: '', position: this.originalInput.length };
    }

    private advance(): Token {
        const token = this.current();
        this.pos++;
        return token;
    }

    private buildNode(depth: number, parent?: { operator: string; side: 'left' | 'right'; position: number }): ExprNode {
        const token = this.current();

        if (token.type === 'EOF') {
            const message = parent
                ? `Unexpected end of input: operator '${parent.operator}' at position ${parent.position} is missing its ${parent.side} operand`
                : 'Unexpected end of input: expression is empty';
            throw createMalformedInputError(message, this.originalInput, token.position);
        }

        // Building, simplifying and printing all recurse once per level
        if (depth > this.maxDepth) {
            throw createMalformedInputError(
                `Expression nests deeper than ${this.maxDepth} levels`,
                this.originalInput,
                token.position,
                { maxDepth: this.maxDepth }
            );
        }

        this.advance();

        if (token.type === 'NUMBER') {
            return { type: 'number', value: token.value };
        }

        if (token.type === 'IDENTIFIER' && this.allowVariables) {
            return { type: 'variable', value: token.value };
        }

        if (this.operatorPolicy === 'strict' && !isOperatorSymbol(token.value)) {
            throw createInvalidOperatorError(token.value, this.originalInput, token.position);
        }

        const left = this.buildNode(depth + 1, { operator: token.value, side: 'left', position: token.position });
        const right = this.buildNode(depth + 1, { operator: token.value, side: 'right', position: token.position });
        return { type: 'operator', value: token.value, left, right };
    }
}
