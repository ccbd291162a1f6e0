import type { BuildOptions, ExprNode } from '../types/index.js';
import { Tokenizer, tokensFromList } from './tokenizer.js';
import { Builder, BuildResult } from './builder.js';

export { Tokenizer, classifyToken, tokensFromList } from './tokenizer.js';
export { Builder } from './builder.js';
export type { BuildResult } from './builder.js';

/**
 * Parse a whitespace-delimited prefix expression into a tree.
 * Fails on trailing tokens.
 */
export function parse(input: string, options: BuildOptions = {}): ExprNode {
    const tokenizer = new Tokenizer(input);
    const tokens = tokenizer.tokenize();
    const builder = new Builder(tokens, input, options);
    return builder.buildComplete();
}

/**
 * Build a tree from the front of a token list.
 * The list is not modified; `consumed` tells how many tokens were used.
 */
export function buildTree(tokens: readonly string[], options: BuildOptions = {}): BuildResult {
    const builder = new Builder(tokensFromList(tokens), tokens.join(' '), options);
    return builder.build();
}

/**
 * Build a tree that must use every token in the list.
 */
export function buildCompleteTree(tokens: readonly string[], options: BuildOptions = {}): ExprNode {
    const builder = new Builder(tokensFromList(tokens), tokens.join(' '), options);
    return builder.buildComplete();
}
