#!/usr/bin/env node
/**
 * reflow command-line interface.
 *
 * Usage:
 *   reflow [options] <input_pattern>
 *
 * Examples:
 *   reflow src
 *   reflow "crates/**\/*.rs" --max-width 80
 *   reflow --config-file ci/reflow.toml src/main.rs
 */

import { Command } from 'commander';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { LayoutEngine } from '@reflow/engine-layout';
import { parsePositiveInteger, run, type CliOptions } from './run.js';

// Read version from package.json
const __dirname = path.dirname(fileURLToPath(import.meta.url));
const packageJsonPath = path.resolve(__dirname, '../package.json');
const packageJson: unknown = JSON.parse(await fs.readFile(packageJsonPath, 'utf-8'));
const version = typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson
    ? String(packageJson.version)
    : '0.0.0';

const program = new Command();

program
    .name('reflow')
    .description('Reformat source files in place, in parallel')
    .version(version)
    .argument('<input_pattern>', 'A file, directory or glob')
    .option('-m, --max-width <n>', 'Maximum width of each line', parsePositiveInteger)
    .option('-t, --tab-spaces <n>', 'Number of spaces per indentation level', parsePositiveInteger)
    .option('-c, --config-file <path>', 'Config file to use instead of discovering reflow.toml')
    .option('--no-color', 'Disable colored output')
    .action(async (inputPattern: string, options: CliOptions) => {
        const exitCode = await run(inputPattern, options, { engine: new LayoutEngine() });
        process.exit(exitCode);
    });

await program.parseAsync();
