/**
 * binop-ast MCP Server
 *
 * MCP server exposing the expression tree operations as tools:
 * parse-expression, simplify-expression, render-expression,
 * evaluate-expression and check-well-formed.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
    CallToolRequestSchema,
    ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import {
    ExpressionException,
    createGenericError,
    serializeExpressionError,
} from './types/index.js';
import * as Handlers from './handlers/core.js';
import {
    checkWellFormedArgsSchema,
    evaluateArgsSchema,
    parseArgsSchema,
    renderArgsSchema,
    simplifyArgsSchema,
    validateArgs,
} from './handlers/schemas.js';
import { TOOLS } from './tools/definitions.js';
import { Config, VERSION, loadConfig } from './config.js';

type ToolHandler = (args: unknown, config: Config) => unknown;

export type ToolCallResult = {
    content: Array<{ type: 'text'; text: string }>;
    isError?: boolean;
};

export const toolHandlers: Record<string, ToolHandler> = {
    'parse-expression': (args, config) =>
        Handlers.parseHandler(validateArgs(parseArgsSchema, args, 'parse-expression'), config),

    'simplify-expression': (args, config) =>
        Handlers.simplifyHandler(validateArgs(simplifyArgsSchema, args, 'simplify-expression'), config),

    'render-expression': (args, config) =>
        Handlers.renderHandler(validateArgs(renderArgsSchema, args, 'render-expression'), config),

    'evaluate-expression': (args, config) =>
        Handlers.evaluateHandler(validateArgs(evaluateArgsSchema, args, 'evaluate-expression'), config),

    'check-well-formed': (args, config) =>
        Handlers.checkWellFormedHandler(validateArgs(checkWellFormedArgsSchema, args, 'check-well-formed'), config),
};

/**
 * Dispatch one tool call and wrap the outcome as MCP text content.
 * Errors become `isError` results; nothing is thrown.
 */
export function handleToolCall(name: string, args: unknown, config: Config): ToolCallResult {
    try {
        const handler = toolHandlers[name];
        if (!handler) {
            throw createGenericError('UNKNOWN_TOOL', `Unknown tool: ${name}`, { tool: name });
        }

        const result = handler(args ?? {}, config);

        return {
            content: [
                {
                    type: 'text',
                    text: JSON.stringify(result, null, 2),
                },
            ],
        };
    } catch (error) {
        // Handle structured ExpressionException
        if (error instanceof ExpressionException) {
            return {
                content: [
                    {
                        type: 'text',
                        text: JSON.stringify(serializeExpressionError(error.error), null, 2),
                    },
                ],
                isError: true,
            };
        }

        // Anything else is a bug; keep a record on stderr
        console.error(`Tool '${name}' failed:`, error);
        const errorMessage = error instanceof Error ? error.message : String(error);
        return {
            content: [
                {
                    type: 'text',
                    text: JSON.stringify({
                        error: errorMessage,
                        type: error instanceof Error ? error.constructor.name : 'Error',
                    }),
                },
            ],
            isError: true,
        };
    }
}

/**
 * Create and configure the MCP server
 */
export function createServer(config: Config = loadConfig()): Server {
    const server = new Server(
        {
            name: 'binop-ast',
            version: VERSION,
        },
        {
            capabilities: {
                tools: {},
            },
        }
    );

    server.setRequestHandler(ListToolsRequestSchema, async () => {
        return { tools: TOOLS };
    });

    server.setRequestHandler(CallToolRequestSchema, async (request) => {
        const { name, arguments: args } = request.params;
        return handleToolCall(name, args, config);
    });

    return server;
}

/**
 * Run the MCP server over stdio
 */
export async function runServer(config?: Config): Promise<void> {
    const server = createServer(config);
    const transport = new StdioServerTransport();
    await server.connect(transport);
    console.error(`binop-ast MCP server v${VERSION} running on stdio`);
}
