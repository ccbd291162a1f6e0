/**
 * Tokenizer Types
 */

export type TokenType =
    | 'NUMBER'        // 12, -3, 0.5
    | 'IDENTIFIER'    // x, rate_1
    | 'SYMBOL'        // + - * / and anything else non-numeric
    | 'EOF';

export interface Token {
    type: TokenType;
    value: string;
    position: number;
}
