/**
 * Engine used by the executor tests to observe worker-thread dispatch.
 *
 * The file name picks the behaviour: `exit*` ends the thread, `throw*`
 * throws, `spin*` busy-waits, anything else reports the thread id.
 */

import * as path from 'node:path';
import { threadId } from 'node:worker_threads';
import type { FormatResult, FormattingEngine } from '../types.js';

const SPIN_MS = 300;

class ThreadEngine implements FormattingEngine {
    readonly name = 'thread';
    readonly description = 'Reports which thread formatted each file';
    readonly extensions = ['.rs'];
    readonly workerModule = import.meta.url;

    async format(filePath: string): Promise<FormatResult> {
        const name = path.basename(filePath);
        if (name.startsWith('exit')) {
            process.exit(3);
        }
        if (name.startsWith('throw')) {
            throw new Error('thread boom');
        }
        if (name.startsWith('spin')) {
            const start = Date.now();
            while (Date.now() - start < SPIN_MS) {
                // busy
            }
            return { ok: true, text: `${start} ${Date.now()}` };
        }
        return { ok: true, text: String(threadId) };
    }
}

export function createEngine(): FormattingEngine {
    return new ThreadEngine();
}
