/**
 * Command execution, separate from argument parsing so it can be driven
 * in-process.
 */

import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';
import {
    BatchRunner,
    createDefaultSettings,
    describeError,
    FatalError,
    resolveSettings,
    ResultReporter,
    type FormattingEngine,
    type ReporterOutput,
} from '@reflow/core';

export const EXIT_SUCCESS = 0;
export const EXIT_FATAL = 2;

/**
 * Options as commander hands them to the action.
 */
export interface CliOptions {
    maxWidth?: number;
    tabSpaces?: number;
    configFile?: string;
    color?: boolean;
}

/**
 * Process-level collaborators, replaceable in tests.
 */
export interface RunContext {
    engine: FormattingEngine;
    cwd?: string;
    output?: ReporterOutput;
    concurrency?: number;
}

/**
 * Format the files selected by `inputPattern`.
 *
 * Returns 0 once the summary is printed, whatever happened to individual
 * files. A fatal error prints `Error: <message>` and returns 2 without a
 * summary.
 */
export async function run(
    inputPattern: string,
    options: CliOptions,
    context: RunContext
): Promise<number> {
    const output = context.output ?? console;
    const cwd = context.cwd ?? process.cwd();
    const useColor = options.color !== false;

    try {
        const settings = await resolveSettings({
            cwd,
            configFile: options.configFile,
            defaults: createDefaultSettings(),
            overrides: { maxWidth: options.maxWidth, tabSpaces: options.tabSpaces },
            onDiscovered: configPath => output.log(`Discovered config at ${configPath}`),
        });

        const reporter = new ResultReporter({ output, basePath: cwd, color: useColor });
        const runner = new BatchRunner(context.engine, {
            cwd,
            reporter,
            concurrency: context.concurrency,
        });

        await runner.run(inputPattern, settings);
        return EXIT_SUCCESS;
    } catch (error) {
        const label = useColor ? chalk.red('Error:') : 'Error:';
        output.error(`${label} ${describeError(error)}`);
        if (!(error instanceof FatalError)) {
            // Not one of ours: keep the stack for bug reports
            output.error(error instanceof Error && error.stack ? error.stack : String(error));
        }
        return EXIT_FATAL;
    }
}

/**
 * Commander argument parser for `--max-width` and `--tab-spaces`.
 */
export function parsePositiveInteger(value: string): number {
    const parsed = Number(value);
    if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed) || parsed <= 0) {
        throw new InvalidArgumentError('Expected a positive integer.');
    }
    return parsed;
}
