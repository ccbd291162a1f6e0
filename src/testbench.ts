/**
 * File-based test bench
 *
 * A test bench directory holds two sub-directories:
 *
 *   inputs/<name>    one prefix expression
 *   outputs/<name>   the expected simplified prefix form
 *
 * Cases are matched by file name.
 */

import { existsSync, readdirSync, readFileSync, statSync } from 'fs';
import { join } from 'path';
import type { ExpressionOptions } from './types/index.js';
import { createIOError } from './types/index.js';
import { parse } from './parser/index.js';
import { simplify } from './transform/simplify.js';
import { toPrefix } from './ast/printer.js';

export interface TestbenchCase {
    name: string;
    input: string;
    /** null when outputs/<name> does not exist */
    expected: string | null;
}

export interface TestbenchCaseResult extends TestbenchCase {
    passed: boolean;
    actual: string | null;
    error?: string;
}

export interface TestbenchReport {
    passed: number;
    failed: number;
    results: TestbenchCaseResult[];
}

function readText(path: string): string {
    return readFileSync(path, 'utf-8').trim();
}

/**
 * Read every case of a test bench directory, sorted by name
 */
export function loadTestbench(dir: string): TestbenchCase[] {
    const inputsDir = join(dir, 'inputs');
    const outputsDir = join(dir, 'outputs');

    if (!existsSync(inputsDir) || !statSync(inputsDir).isDirectory()) {
        throw createIOError(`Test bench inputs directory not found: ${inputsDir}`, { dir });
    }

    return readdirSync(inputsDir)
        .filter(name => statSync(join(inputsDir, name)).isFile())
        .sort()
        .map(name => {
            const outputPath = join(outputsDir, name);
            return {
                name,
                input: readText(join(inputsDir, name)),
                expected: existsSync(outputPath) ? readText(outputPath) : null,
            };
        });
}

/**
 * Simplify each case and compare with its expected prefix form.
 * A failing case never stops the run.
 */
export function runTestbench(cases: TestbenchCase[], options: ExpressionOptions = {}): TestbenchReport {
    const results = cases.map((testCase): TestbenchCaseResult => {
        if (testCase.expected === null) {
            return { ...testCase, passed: false, actual: null, error: `Missing expected output for '${testCase.name}'` };
        }

        try {
            const actual = toPrefix(simplify(parse(testCase.input, options), options));
            return { ...testCase, passed: actual === testCase.expected, actual };
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            return { ...testCase, passed: false, actual: null, error: message };
        }
    });

    const passed = results.filter(r => r.passed).length;
    return { passed, failed: results.length - passed, results };
}
