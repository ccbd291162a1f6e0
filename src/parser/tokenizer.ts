import type { Token, TokenType } from '../types/parser.js';
import { isNumericLiteral } from '../arithmetic.js';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Classify a single whitespace-delimited token
 */
export function classifyToken(value: string): TokenType {
    if (isNumericLiteral(value)) return 'NUMBER';
    if (IDENTIFIER.test(value)) return 'IDENTIFIER';
    return 'SYMBOL';
}

/**
 * Tokenizer for whitespace-delimited prefix expressions
 */
export class Tokenizer {
    private input: string;
    private pos: number = 0;
    private tokens: Token[] = [];

    constructor(input: string) {
        this.input = input;
    }

    tokenize(): Token[] {
        while (this.pos < this.input.length) {
            this.skipWhitespace();
            if (this.pos >= this.input.length) break;

            const start = this.pos;
            while (this.pos < this.input.length && !/\s/.test(this.input[this.pos])) {
                this.pos++;
            }
            const value = this.input.slice(start, this.pos);
            this.tokens.push({ type: classifyToken(value), value, position: start });
        }

        this.tokens.push({ type: 'EOF', value: '', position: this.pos });
        return this.tokens;
    }

    private skipWhitespace(): void {
        while (this.pos < this.input.length && /\s/.test(this.input[this.pos])) {
            this.pos++;
        }
    }
}

/**
 * Build positioned tokens from an already-split token list.
 * Positions are those the tokens would have in `list.join(' ')`.
 */
export function tokensFromList(list: readonly string[]): Token[] {
    const tokens: Token[] = [];
    let position = 0;
    for (const value of list) {
        tokens.push({ type: classifyToken(value), value, position });
        position += value.length + 1;
    }
    tokens.push({ type: 'EOF', value: '', position: Math.max(0, position - 1) });
    return tokens;
}
