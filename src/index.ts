#!/usr/bin/env node
/**
 * binop-ast - MCP server entry point
 */

import 'dotenv/config';
import { runServer } from './server.js';
import { VERSION, loadConfig } from './config.js';

async function main(): Promise<void> {
    const args = process.argv.slice(2);

    if (args.includes('--help') || args.includes('-h')) {
        console.log(`
binop-ast MCP Server - prefix expression trees

Usage: binop-ast [options]

Options:
  --help, -h     Show this help message
  --version, -v  Show version information

Tools:
  - parse-expression     Build a tree and render prefix/infix/postfix
  - simplify-expression  Apply identity, zero and folding rules
  - render-expression    Render in one notation
  - evaluate-expression  Compute the numeric value
  - check-well-formed    Validate expressions with lint warnings

Environment:
  BINOP_FOLD, BINOP_FOLDING_ERRORS, BINOP_OPERATOR_POLICY,
  BINOP_ALLOW_VARIABLES, BINOP_MAX_DEPTH, BINOP_VERBOSITY
  (read from .env if present)

The server communicates via stdio using the Model Context Protocol.
`);
        process.exit(0);
    }

    if (args.includes('--version') || args.includes('-v')) {
        console.log(`binop-ast version ${VERSION}`);
        process.exit(0);
    }

    try {
        await runServer(loadConfig());
    } catch (error) {
        console.error('Failed to start server:', error);
        process.exit(1);
    }
}

void main();
