/**
 * Batch runner.
 *
 * This is the main entry point for formatting a set of files. It expands the
 * input, dispatches the batch, and feeds outcomes to the reporter. Settings
 * are resolved beforehand and passed in.
 */

import { performance } from 'node:perf_hooks';
import { BatchExecutor, type ExecutorOptions } from './executor.js';
import { expandInput } from './expand.js';
import type { ResultReporter } from './reporter.js';
import type { BatchSummary, FormattingEngine, Settings, TaskOutcome } from './types.js';

export interface RunnerOptions extends ExecutorOptions {
    /** Base directory for the input. Defaults to the process working directory. */
    cwd?: string;

    /** Receives per-file lines and the summary */
    reporter?: ResultReporter;
}

export class BatchRunner {
    private readonly engine: FormattingEngine;
    private readonly executor: BatchExecutor;
    private readonly cwd: string | undefined;
    private readonly reporter: ResultReporter | undefined;

    constructor(engine: FormattingEngine, options: RunnerOptions = {}) {
        this.engine = engine;
        this.executor = new BatchExecutor(engine, options);
        this.cwd = options.cwd;
        this.reporter = options.reporter;
    }

    /**
     * Format every file the input selects.
     *
     * Expansion happens before the clock starts; only dispatch-and-wait is
     * timed. The summary is reported after every per-file line.
     *
     * @throws PatternError when the input is not a valid glob
     */
    async run(input: string, settings: Settings): Promise<BatchSummary> {
        const entries = await expandInput(input, {
            cwd: this.cwd,
            extensions: this.engine.extensions,
        });

        const start = performance.now();
        const outcomes = await this.executor.execute(
            entries,
            settings,
            outcome => this.reporter?.outcome(outcome)
        );
        const durationMs = Math.floor(performance.now() - start);

        const summary = summarize(outcomes, durationMs);
        this.reporter?.summary(summary);
        return summary;
    }
}

function summarize(outcomes: TaskOutcome[], durationMs: number): BatchSummary {
    const failed = outcomes.filter(o => o.status === 'failure').length;
    return {
        total: outcomes.length,
        succeeded: outcomes.length - failed,
        failed,
        durationMs,
    };
}
