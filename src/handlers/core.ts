import type {
    BuildOptions,
    EvaluateResponse,
    ParseResponse,
    RenderResponse,
    SimplifyResponse,
} from '../types/index.js';
import type { Config } from '../config.js';
import type {
    CheckWellFormedArgs,
    EvaluateArgs,
    ParseArgs,
    RenderArgs,
    SimplifyArgs,
} from './schemas.js';
import { parse } from '../parser/index.js';
import { render, toInfix, toPostfix, toPrefix, toTreeString } from '../ast/printer.js';
import { countNodes, treeDepth } from '../ast/visitor.js';
import { simplifyWithTrace } from '../transform/simplify.js';
import { evaluate } from '../utils/evaluation.js';
import { buildSimplifyResponse } from '../utils/response.js';
import { validateExpressions, ValidationReport } from '../syntaxValidator.js';

function buildOptions(args: ParseArgs, config: Config): BuildOptions {
    return {
        operatorPolicy: args.operator_policy ?? config.operatorPolicy,
        allowVariables: args.allow_variables ?? config.allowVariables,
        maxDepth: config.maxDepth,
    };
}

export function parseHandler(args: ParseArgs, config: Config): ParseResponse {
    const tree = parse(args.expression, buildOptions(args, config));
    return {
        success: true,
        prefix: toPrefix(tree),
        infix: toInfix(tree),
        postfix: toPostfix(tree),
        tree: toTreeString(tree),
        nodeCount: countNodes(tree),
        depth: treeDepth(tree),
    };
}

export function simplifyHandler(args: SimplifyArgs, config: Config): SimplifyResponse {
    const tree = parse(args.expression, buildOptions(args, config));
    const { result, steps } = simplifyWithTrace(tree, {
        fold: args.fold ?? config.fold,
        onFoldingError: args.skip_folding_errors === undefined
            ? config.onFoldingError
            : args.skip_folding_errors ? 'skip' : 'throw',
    });
    return buildSimplifyResponse(tree, result, steps, args.verbosity ?? config.verbosity);
}

export function renderHandler(args: RenderArgs, config: Config): RenderResponse {
    const tree = parse(args.expression, buildOptions(args, config));
    return {
        success: true,
        notation: args.notation,
        output: render(tree, args.notation),
    };
}

export function evaluateHandler(args: EvaluateArgs, config: Config): EvaluateResponse {
    // Bindings only make sense with variable leaves
    const tree = parse(args.expression, {
        operatorPolicy: args.operator_policy ?? config.operatorPolicy,
        allowVariables: args.allow_variables ?? (args.bindings !== undefined || config.allowVariables),
        maxDepth: config.maxDepth,
    });
    return {
        success: true,
        value: evaluate(tree, args.bindings ?? {}),
    };
}

export function checkWellFormedHandler(args: CheckWellFormedArgs, config: Config): ValidationReport {
    return validateExpressions(args.expressions, {
        operatorPolicy: args.operator_policy ?? config.operatorPolicy,
        allowVariables: args.allow_variables ?? config.allowVariables,
        maxDepth: config.maxDepth,
    });
}
