/**
 * Environment configuration
 *
 * Entry points load `.env` through dotenv before calling `loadConfig`.
 *
 *   BINOP_FOLD              true | false   constant folding (default true)
 *   BINOP_FOLDING_ERRORS    throw | skip   division by zero while folding
 *   BINOP_OPERATOR_POLICY   strict | passthrough
 *   BINOP_ALLOW_VARIABLES   true | false
 *   BINOP_MAX_DEPTH         positive integer (default 1000)
 *   BINOP_VERBOSITY         minimal | standard | detailed
 */

import { z } from 'zod';
import type { ExpressionOptions } from './types/index.js';
import { DEFAULTS, createGenericError } from './types/index.js';

const booleanFlag = z
    .enum(['true', 'false', '1', '0'])
    .transform(v => v === 'true' || v === '1');

const envSchema = z.object({
    BINOP_FOLD: booleanFlag.optional(),
    BINOP_FOLDING_ERRORS: z.enum(['throw', 'skip']).optional(),
    BINOP_OPERATOR_POLICY: z.enum(['strict', 'passthrough']).optional(),
    BINOP_ALLOW_VARIABLES: booleanFlag.optional(),
    BINOP_MAX_DEPTH: z.coerce.number().int().positive().optional(),
    BINOP_VERBOSITY: z.enum(['minimal', 'standard', 'detailed']).optional(),
});

export const VERSION = '1.0.0';

export type Config = Required<ExpressionOptions>;

/**
 * Resolve options from the environment, falling back to DEFAULTS
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
        throw createGenericError('INVALID_ARGUMENT', `Invalid configuration: ${issues.join('; ')}`, { issues });
    }

    const vars = parsed.data;
    return {
        fold: vars.BINOP_FOLD ?? DEFAULTS.fold,
        onFoldingError: vars.BINOP_FOLDING_ERRORS ?? DEFAULTS.onFoldingError,
        operatorPolicy: vars.BINOP_OPERATOR_POLICY ?? DEFAULTS.operatorPolicy,
        allowVariables: vars.BINOP_ALLOW_VARIABLES ?? DEFAULTS.allowVariables,
        maxDepth: vars.BINOP_MAX_DEPTH ?? DEFAULTS.maxDepth,
        verbosity: vars.BINOP_VERBOSITY ?? DEFAULTS.verbosity,
    };
}
