/**
 * Worker-thread pool for engines that declare a `workerModule`.
 *
 * Each thread hosts its own engine instance and formats one file at a time,
 * so synchronous engines run in parallel. A thread that dies mid-task fails
 * that task only; the next task gets a fresh thread.
 */

import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { Worker } from 'node:worker_threads';
import { z } from 'zod';
import { describeError } from './errors.js';
import type { FormatResult, Settings } from './types.js';

const TaskReplySchema = z.union([
    z.object({
        result: z.discriminatedUnion('ok', [
            z.object({ ok: z.literal(true), text: z.string() }),
            z.object({ ok: z.literal(false), message: z.string() }),
        ]),
    }),
    z.object({ crash: z.string() }),
]);

interface PendingTask {
    resolve: (result: FormatResult) => void;
    reject: (error: Error) => void;
}

/**
 * One worker thread and the task it is currently running.
 */
class EngineThread {
    private readonly worker: Worker;
    private pending: PendingTask | undefined;

    /** Set once the thread has failed or exited; it takes no further tasks. */
    broken = false;

    constructor(script: URL, engineModule: string) {
        this.worker = new Worker(script, {
            workerData: { engineModule },
            execArgv: threadExecArgv(script),
        });
        this.worker.on('message', (message: unknown) => this.settle(message));
        this.worker.on('error', error => this.abort(describeError(error)));
        this.worker.on('exit', code => this.abort(`worker exited with code ${code}`));
    }

    format(filePath: string, settings: Settings): Promise<FormatResult> {
        return new Promise((resolve, reject) => {
            if (this.broken) {
                reject(new Error('worker is no longer running'));
                return;
            }
            this.pending = { resolve, reject };
            this.worker.postMessage({ filePath, settings });
        });
    }

    async terminate(): Promise<void> {
        this.broken = true;
        await this.worker.terminate();
    }

    private settle(message: unknown): void {
        const task = this.takePending();
        if (!task) return;

        const reply = TaskReplySchema.safeParse(message);
        if (!reply.success) {
            task.reject(new Error('unrecognized reply from worker'));
        } else if ('result' in reply.data) {
            task.resolve(reply.data.result);
        } else {
            task.reject(new Error(reply.data.crash));
        }
    }

    private abort(reason: string): void {
        this.broken = true;
        this.takePending()?.reject(new Error(reason));
    }

    private takePending(): PendingTask | undefined {
        const task = this.pending;
        this.pending = undefined;
        return task;
    }
}

/**
 * Threads are spawned on demand; the executor's pool bounds how many tasks,
 * and so how many threads, are in flight at once.
 */
export class EngineThreadPool {
    private readonly engineModule: string;
    private readonly script: URL;
    private readonly idle: EngineThread[] = [];
    private readonly threads = new Set<EngineThread>();

    constructor(engineModule: string) {
        this.engineModule = engineModule;
        this.script = engineThreadScript();
    }

    /**
     * Format one file on a pooled thread.
     *
     * Rejects when the engine throws or the thread dies.
     */
    async format(filePath: string, settings: Settings): Promise<FormatResult> {
        const thread = this.idle.pop() ?? this.spawn();
        try {
            return await thread.format(filePath, settings);
        } finally {
            if (thread.broken) {
                this.threads.delete(thread);
                await thread.terminate();
            } else {
                this.idle.push(thread);
            }
        }
    }

    /** Stop every thread. */
    async close(): Promise<void> {
        const threads = [...this.threads];
        this.threads.clear();
        this.idle.length = 0;
        await Promise.all(threads.map(thread => thread.terminate()));
    }

    private spawn(): EngineThread {
        const thread = new EngineThread(this.script, this.engineModule);
        this.threads.add(thread);
        return thread;
    }
}

function engineThreadScript(): URL {
    const extension = path.extname(fileURLToPath(import.meta.url));
    return new URL(`./engine-thread${extension}`, import.meta.url);
}

/**
 * Running from TypeScript sources, threads need the tsx loader. It is
 * inherited when the process was started with it, but not when tsx was
 * registered programmatically.
 */
function threadExecArgv(script: URL): string[] | undefined {
    if (!script.pathname.endsWith('.ts') || process.execArgv.some(arg => arg.includes('tsx'))) {
        return undefined;
    }
    return [...process.execArgv, '--import', import.meta.resolve('tsx')];
}
