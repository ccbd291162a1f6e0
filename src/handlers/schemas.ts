import { z } from 'zod';
import { createGenericError } from '../types/index.js';

const operatorPolicySchema = z.enum(['strict', 'passthrough']).optional();
const verbositySchema = z.enum(['minimal', 'standard', 'detailed']).optional();

export const parseArgsSchema = z.object({
    expression: z.string(),
    operator_policy: operatorPolicySchema,
    allow_variables: z.boolean().optional(),
});

export const simplifyArgsSchema = parseArgsSchema.extend({
    fold: z.boolean().optional(),
    skip_folding_errors: z.boolean().optional(),
    verbosity: verbositySchema,
});

export const renderArgsSchema = parseArgsSchema.extend({
    notation: z.enum(['prefix', 'infix', 'postfix', 'tree']),
});

export const evaluateArgsSchema = parseArgsSchema.extend({
    bindings: z.record(z.number()).optional(),
});

export const checkWellFormedArgsSchema = z.object({
    expressions: z.array(z.string()),
    operator_policy: operatorPolicySchema,
    allow_variables: z.boolean().optional(),
});

export type ParseArgs = z.infer<typeof parseArgsSchema>;
export type SimplifyArgs = z.infer<typeof simplifyArgsSchema>;
export type RenderArgs = z.infer<typeof renderArgsSchema>;
export type EvaluateArgs = z.infer<typeof evaluateArgsSchema>;
export type CheckWellFormedArgs = z.infer<typeof checkWellFormedArgsSchema>;

/**
 * Validate raw tool arguments, raising INVALID_ARGUMENT with every issue found
 */
export function validateArgs<T extends z.ZodTypeAny>(schema: T, args: unknown, tool: string): z.infer<T> {
    const parsed = schema.safeParse(args);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
        throw createGenericError('INVALID_ARGUMENT', `Invalid arguments for '${tool}': ${issues.join('; ')}`, { issues });
    }
    return parsed.data;
}
