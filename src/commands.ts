/**
 * Line-oriented commands shared by the CLI and its REPL
 */

import type { ExpressionOptions, Notation, SimplifyStep } from './types/index.js';
import { NOTATIONS } from './types/index.js';
import { parse } from './parser/index.js';
import { render } from './ast/printer.js';
import { simplifyWithTrace } from './transform/simplify.js';

export type LineOutcome<T> =
    | ({ ok: true; input: string } & T)
    | { ok: false; input: string; error: string; code?: string };

export type SimplifyOutcome = LineOutcome<{ output: string; steps: SimplifyStep[] }>;

export type RenderOutcome = LineOutcome<{ outputs: Partial<Record<Notation, string>> }>;

/**
 * Expression lines of a file: trimmed, without blanks and `#` or `%` comments
 */
export function readExpressionLines(content: string): string[] {
    return content.split('\n')
        .map(l => l.trim())
        .filter(l => l && !l.startsWith('#') && !l.startsWith('%'));
}

function failure(input: string, error: unknown): { ok: false; input: string; error: string; code?: string } {
    const message = error instanceof Error ? error.message : String(error);
    const code = error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return { ok: false, input, error: message, ...(code && { code }) };
}

export function simplifyLine(
    input: string,
    options: ExpressionOptions = {},
    notation: Notation = 'prefix'
): SimplifyOutcome {
    try {
        const { result, steps } = simplifyWithTrace(parse(input, options), options);
        return { ok: true, input, output: render(result, notation), steps };
    } catch (error) {
        return failure(input, error);
    }
}

export function renderLine(
    input: string,
    options: ExpressionOptions = {},
    notations: readonly Notation[] = ['prefix', 'infix', 'postfix']
): RenderOutcome {
    try {
        const tree = parse(input, options);
        const outputs: Partial<Record<Notation, string>> = {};
        for (const notation of notations) {
            outputs[notation] = render(tree, notation);
        }
        return { ok: true, input, outputs };
    } catch (error) {
        return failure(input, error);
    }
}

export function isNotation(value: string): value is Notation {
    return (NOTATIONS as readonly string[]).includes(value);
}

export interface CliArgs {
    notation: Notation;
    /** Command name and its file or directory argument */
    positional: string[];
    error?: string;
}

/**
 * Split CLI arguments into positionals and the notation option.
 * Accepts both `--notation=infix` and `--notation infix`; other flags are
 * read by the caller.
 */
export function parseCliArgs(args: readonly string[]): CliArgs {
    let notation: Notation = 'prefix';
    const positional: string[] = [];

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        let value: string;
        if (arg.startsWith('--notation=')) {
            value = arg.slice('--notation='.length);
        } else if (arg === '--notation') {
            if (i + 1 >= args.length) {
                return { notation, positional, error: '--notation requires a value' };
            }
            value = args[++i];
        } else {
            if (!arg.startsWith('-')) positional.push(arg);
            continue;
        }

        if (!isNotation(value)) {
            return {
                notation,
                positional,
                error: `Invalid notation '${value}'. Valid options are: ${NOTATIONS.join(', ')}`,
            };
        }
        notation = value;
    }

    return { notation, positional };
}
