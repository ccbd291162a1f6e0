/**
 * Shared test fixtures for consistent, DRY testing.
 */
import { parse } from '../src/parser/index.js';
import { simplify } from '../src/transform/simplify.js';
import { toPrefix } from '../src/ast/printer.js';
import type { ExpressionOptions } from '../src/types/index.js';

// === Simplification scenarios ===
// Expected simplified prefix form without and with constant folding.
export const SCENARIOS = [
    { name: 'inner additive identity', input: '+ 1 + 2 0', identitiesOnly: '+ 1 2', folded: '3' },
    { name: 'inner multiplicative identity', input: '+ 1 * 2 1', identitiesOnly: '+ 1 2', folded: '3' },
    { name: 'nested multiplicative identities', input: '* 1 * 3 1', identitiesOnly: '3', folded: '3' },
    { name: 'multiplication by zero at the root', input: '* 1 0', identitiesOnly: '0', folded: '0' },
    { name: 'zero exposed by a child', input: '+ 1 * 0 1', identitiesOnly: '1', folded: '1' },
] as const;

// === Folding policies ===
export const FOLD_POLICIES = [
    { policy: 'identities only', options: { fold: false }, key: 'identitiesOnly' },
    { policy: 'with constant folding', options: { fold: true }, key: 'folded' },
] as const;

// === Helpers ===
export function simplifyPrefix(input: string, options: ExpressionOptions = {}): string {
    return toPrefix(simplify(parse(input, options), options));
}
