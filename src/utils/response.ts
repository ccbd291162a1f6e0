import type {
    DetailedSimplifyResponse,
    ExprNode,
    MinimalSimplifyResponse,
    SimplifyResponse,
    SimplifyStep,
    StandardSimplifyResponse,
    Verbosity,
} from '../types/index.js';
import { nodesEqual } from '../ast/equality.js';
import { toInfix, toPostfix, toPrefix } from '../ast/printer.js';
import { countNodes, treeDepth } from '../ast/visitor.js';

/**
 * Build a simplify response based on verbosity level
 */
export function buildSimplifyResponse(
    original: ExprNode,
    simplified: ExprNode,
    steps: SimplifyStep[],
    verbosity: Verbosity = 'standard'
): SimplifyResponse {
    if (verbosity === 'minimal') {
        const response: MinimalSimplifyResponse = {
            success: true,
            prefix: toPrefix(simplified),
        };
        return response;
    }

    const standard: StandardSimplifyResponse = {
        success: true,
        prefix: toPrefix(simplified),
        infix: toInfix(simplified),
        postfix: toPostfix(simplified),
        changed: !nodesEqual(original, simplified),
    };

    if (verbosity === 'standard') {
        return standard;
    }

    // detailed
    const response: DetailedSimplifyResponse = {
        ...standard,
        original: toPrefix(original),
        steps,
        statistics: {
            nodesBefore: countNodes(original),
            nodesAfter: countNodes(simplified),
            depthBefore: treeDepth(original),
            depthAfter: treeDepth(simplified),
        },
    };
    return response;
}
