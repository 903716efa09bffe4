/**
 * @reflow/core
 *
 * Orchestration core for reflow.
 *
 * This package provides:
 * - Settings defaults, config file schema and precedence resolution
 * - Upward discovery of `reflow.toml`
 * - Expansion of a file, directory or glob into candidate paths
 * - A bounded executor that isolates per-file failures
 * - Console reporting of outcomes and the batch summary
 *
 * @example
 * ```typescript
 * import { BatchRunner, ResultReporter, resolveSettings } from '@reflow/core';
 * import { LayoutEngine } from '@reflow/engine-layout';
 *
 * const settings = await resolveSettings({ overrides: { maxWidth: 80 } });
 * const runner = new BatchRunner(new LayoutEngine(), { reporter: new ResultReporter() });
 * const summary = await runner.run('src', settings);
 * console.log(`${summary.failed} of ${summary.total} failed`);
 * ```
 */

export * from './types.js';
export * from './errors.js';
export * from './settings.js';
export * from './discovery.js';
export * from './config.js';
export * from './expand.js';
export { BatchExecutor, runPool, type ExecutorOptions } from './executor.js';
export { ResultReporter, type ReporterOptions, type ReporterOutput } from './reporter.js';
export { BatchRunner, type RunnerOptions } from './runner.js';
