/**
 * Batch executor.
 *
 * Dispatches one independent task per candidate entry across a bounded pool,
 * turns every way a task can go wrong into a Failure outcome, and writes
 * formatted text back over the original file on success.
 *
 * Engines that declare a `workerModule` run on worker threads; others are
 * called on the main thread.
 */

import * as os from 'node:os';
import * as fs from 'node:fs/promises';
import { EngineThreadPool } from './engine-pool.js';
import { describeError } from './errors.js';
import type {
    ExpandedEntry,
    FormatResult,
    FormattingEngine,
    Settings,
    TaskOutcome,
} from './types.js';

/**
 * Options for the executor.
 */
export interface ExecutorOptions {
    /**
     * Maximum number of tasks in flight.
     * Defaults to the available hardware parallelism.
     */
    concurrency?: number;
}

/**
 * Runs formatting tasks for a batch.
 *
 * Tasks touch disjoint files and only read the shared Settings, so they need
 * no coordination beyond the pool itself. A batch always runs to completion.
 */
export class BatchExecutor {
    private readonly engine: FormattingEngine;
    private readonly concurrency: number;

    constructor(engine: FormattingEngine, options: ExecutorOptions = {}) {
        this.engine = engine;
        this.concurrency = Math.max(1, options.concurrency ?? os.availableParallelism());
    }

    /**
     * Format every entry and wait for all of them.
     *
     * @param entries - Output of input expansion
     * @param settings - Shared settings, never modified
     * @param onOutcome - Called as each task completes, in completion order
     * @returns One outcome per entry, in input order
     */
    async execute(
        entries: readonly ExpandedEntry[],
        settings: Settings,
        onOutcome?: (outcome: TaskOutcome) => void
    ): Promise<TaskOutcome[]> {
        const threads = this.engine.workerModule !== undefined
            ? new EngineThreadPool(this.engine.workerModule)
            : undefined;
        const format: FormatFile = threads
            ? (filePath, shared) => threads.format(filePath, shared)
            : (filePath, shared) => this.engine.format(filePath, shared);

        try {
            return await runPool(entries, this.concurrency, async entry => {
                const outcome = await this.runTask(entry, settings, format);
                onOutcome?.(outcome);
                return outcome;
            });
        } finally {
            await threads?.close();
        }
    }

    /**
     * Run one task. Never rejects.
     */
    private async runTask(
        entry: ExpandedEntry,
        settings: Settings,
        format: FormatFile
    ): Promise<TaskOutcome> {
        if (entry.kind === 'error') {
            return failure(entry.path, entry.message);
        }

        const filePath = entry.path;

        let result: FormatResult;
        try {
            result = await format(filePath, settings);
        } catch (error) {
            return failure(filePath, `engine terminated abnormally: ${describeError(error)}`);
        }

        if (!result.ok) {
            return failure(filePath, result.message);
        }

        // Not atomic: a crash mid-write can leave a partially written file
        try {
            await fs.writeFile(filePath, result.text, 'utf-8');
        } catch (error) {
            return failure(filePath, `failed to write formatted output: ${describeError(error)}`);
        }

        return { status: 'success', path: filePath };
    }
}

type FormatFile = (filePath: string, settings: Settings) => Promise<FormatResult>;

function failure(filePath: string, message: string): TaskOutcome {
    return { status: 'failure', path: filePath, message };
}

/**
 * Run `worker` over `items` with at most `concurrency` calls in flight.
 * Results keep the input order.
 */
export async function runPool<T, R>(
    items: readonly T[],
    concurrency: number,
    worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
    const results: R[] = new Array<R>(items.length);
    let nextIndex = 0;

    async function runNext(): Promise<void> {
        while (nextIndex < items.length) {
            const i = nextIndex++;
            results[i] = await worker(items[i], i);
        }
    }

    const workers = Array.from({ length: Math.min(concurrency, items.length) }, () => runNext());
    await Promise.all(workers);
    return results;
}
