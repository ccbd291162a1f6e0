#!/usr/bin/env node
import 'dotenv/config';
import { readFileSync } from 'fs';
import * as readline from 'readline';
import chalk from 'chalk';
import type { ExpressionOptions, Notation } from './types/index.js';
import { VERSION, loadConfig } from './config.js';
import {
    isNotation,
    parseCliArgs,
    readExpressionLines,
    renderLine,
    simplifyLine,
    SimplifyOutcome,
} from './commands.js';
import { loadTestbench, runTestbench } from './testbench.js';

const HELP = `
binop-ast CLI v${VERSION}

Usage:
  binop-ast-cli simplify <file>   Simplify each expression line, print the result
  binop-ast-cli render <file>     Print prefix, infix and postfix of each line
  binop-ast-cli verify <dir>      Run a test bench (<dir>/inputs, <dir>/outputs)
  binop-ast-cli repl              Interactive mode

Options:
  --no-fold               Identity rules only, no constant folding
  --skip-folding-errors   Leave x / 0 unfolded instead of failing
  --passthrough           Accept any non-numeric token as an operator
  --variables             Accept identifiers as variable leaves
  --notation <name>       Output notation (prefix, infix, postfix, tree)
  --trace                 Show each rule applied while simplifying
  --help, -h              Show this help
  --version, -v           Show version

Lines starting with # or % are comments.

Examples:
  binop-ast-cli simplify --no-fold exprs.txt
  binop-ast-cli verify ./testbench
`;

const args = process.argv.slice(2);

const cliArgs = parseCliArgs(args);
if (cliArgs.error) {
    console.error(chalk.red(`Error: ${cliArgs.error}`));
    process.exit(1);
}

let notation: Notation = cliArgs.notation;
const cleanArgs = cliArgs.positional;

const config = loadConfig();
const options: ExpressionOptions = {
    ...config,
    fold: args.includes('--no-fold') ? false : config.fold,
    onFoldingError: args.includes('--skip-folding-errors') ? 'skip' : config.onFoldingError,
    operatorPolicy: args.includes('--passthrough') ? 'passthrough' : config.operatorPolicy,
    allowVariables: args.includes('--variables') ? true : config.allowVariables,
};
const trace = args.includes('--trace');

const commandName = cleanArgs[0];
const target = cleanArgs[1];

function printSimplified(outcome: SimplifyOutcome): void {
    if (!outcome.ok) {
        console.log(chalk.red(`✗ ${outcome.input}`));
        console.log(chalk.red(`  Error: ${outcome.error}`));
        return;
    }
    console.log(`${chalk.dim(outcome.input)} ${chalk.dim('=>')} ${chalk.bold(outcome.output)}`);
    if (trace) {
        for (const step of outcome.steps) {
            console.log(chalk.gray(`  [${step.rule}] ${step.before} -> ${step.after}`));
        }
    }
}

async function main(): Promise<void> {
    if (args.includes('--help') || args.includes('-h') || !commandName) {
        console.log(HELP);
        return;
    }

    if (args.includes('--version') || args.includes('-v')) {
        console.log(VERSION);
        return;
    }

    if (commandName === 'repl') {
        return runRepl();
    }

    if (!target) {
        console.error(chalk.red('Error: file or directory argument required'));
        process.exit(1);
    }

    switch (commandName) {
        case 'simplify': {
            const lines = readExpressionLines(readFileSync(target, 'utf-8'));
            let allOk = true;
            for (const line of lines) {
                const outcome = simplifyLine(line, options, notation);
                printSimplified(outcome);
                if (!outcome.ok) allOk = false;
            }
            process.exit(allOk ? 0 : 1);
            break;
        }
        case 'render': {
            const lines = readExpressionLines(readFileSync(target, 'utf-8'));
            let allOk = true;
            for (const line of lines) {
                const outcome = renderLine(line, options);
                if (!outcome.ok) {
                    console.log(chalk.red(`✗ ${outcome.input}`));
                    console.log(chalk.red(`  Error: ${outcome.error}`));
                    allOk = false;
                    continue;
                }
                console.log(chalk.bold(outcome.input));
                for (const [name, output] of Object.entries(outcome.outputs)) {
                    console.log(`  ${chalk.cyan(name.padEnd(8))} ${output}`);
                }
            }
            process.exit(allOk ? 0 : 1);
            break;
        }
        case 'verify': {
            const report = runTestbench(loadTestbench(target), options);
            for (const result of report.results) {
                if (result.passed) {
                    console.log(chalk.green(`✓ ${result.name}`));
                } else {
                    console.log(chalk.red(`✗ ${result.name}`));
                    console.log(`  input:    ${result.input}`);
                    console.log(`  expected: ${result.expected ?? '(missing)'}`);
                    console.log(`  actual:   ${result.actual ?? result.error ?? ''}`);
                }
            }
            const summary = `${report.passed} passed, ${report.failed} failed`;
            console.log(report.failed === 0 ? chalk.green(summary) : chalk.red(summary));
            process.exit(report.failed === 0 ? 0 : 1);
            break;
        }
        default:
            console.error(chalk.red(`Unknown command: ${commandName}`));
            console.log(HELP);
            process.exit(1);
    }
}

function runRepl(): void {
    const rl = readline.createInterface({
        input: process.stdin,
        output: process.stdout,
        prompt: 'binop> '
    });

    console.log(chalk.bold(`binop-ast REPL v${VERSION}`));
    console.log(chalk.gray('Type a prefix expression to simplify it. Commands: .fold on|off, .notation <name>, .render <expr>, .help, .quit\n'));
    rl.prompt();

    rl.on('line', (line) => {
        const trimmed = line.trim();

        if (trimmed === '.help') {
            console.log('Commands:');
            console.log('  <expr>              Simplify a prefix expression');
            console.log('  .render <expr>      Show every notation without simplifying');
            console.log('  .fold on|off        Toggle constant folding');
            console.log('  .notation <name>    prefix, infix, postfix or tree');
            console.log('  .quit, .exit, .q    Exit REPL');
        } else if (trimmed.startsWith('.fold ')) {
            options.fold = trimmed.slice(6).trim() !== 'off';
            console.log(`Constant folding ${options.fold ? 'on' : 'off'}`);
        } else if (trimmed.startsWith('.notation ')) {
            const value = trimmed.slice(10).trim();
            if (isNotation(value)) {
                notation = value;
                console.log(`Notation: ${notation}`);
            } else {
                console.log(chalk.red(`Unknown notation '${value}'`));
            }
        } else if (trimmed.startsWith('.render ')) {
            const outcome = renderLine(trimmed.slice(8).trim(), options, ['prefix', 'infix', 'postfix', 'tree']);
            if (outcome.ok) {
                for (const [name, output] of Object.entries(outcome.outputs)) {
                    console.log(`${chalk.cyan(name)}:\n${output}`);
                }
            } else {
                console.log(chalk.red(`✗ ${outcome.error}`));
            }
        } else if (trimmed === '.quit' || trimmed === '.exit' || trimmed === '.q') {
            rl.close();
            return;
        } else if (trimmed.startsWith('.')) {
            console.log('Unknown command. Use .help for a list');
        } else if (trimmed) {
            printSimplified(simplifyLine(trimmed, options, notation));
        }
        rl.prompt();
    });

    rl.on('close', () => process.exit(0));
}

main().catch(e => {
    console.error(chalk.red('Error:'), e instanceof Error ? e.message : e);
    process.exit(1);
});
