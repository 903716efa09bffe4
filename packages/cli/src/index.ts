/**
 * @reflow/cli
 *
 * Command-line interface for reflow.
 *
 * @example
 * ```bash
 * # Format every .rs file under src/
 * npx reflow src
 *
 * # Narrower lines for one run
 * npx reflow --max-width 80 "src/**\/*.rs"
 * ```
 */

export { run, parsePositiveInteger, EXIT_FATAL, EXIT_SUCCESS } from './run.js';
export type { CliOptions, RunContext } from './run.js';
