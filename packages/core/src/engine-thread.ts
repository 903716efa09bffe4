/**
 * Entry point of an engine worker thread.
 *
 * Loads the engine module named in `workerData` and formats one file per
 * message, replying with `{ result }` or, when the engine throws, `{ crash }`.
 */

import { parentPort, workerData } from 'node:worker_threads';
import { z } from 'zod';
import { describeError } from './errors.js';
import { SettingsSchema } from './settings.js';
import type { FormatResult, FormattingEngine } from './types.js';

const WorkerDataSchema = z.object({ engineModule: z.string() });

const TaskRequestSchema = z.object({
    filePath: z.string(),
    settings: SettingsSchema,
});

function isFormattingEngine(value: unknown): value is FormattingEngine {
    return typeof value === 'object'
        && value !== null
        && 'format' in value
        && typeof value.format === 'function';
}

async function loadEngine(specifier: string): Promise<FormattingEngine> {
    const loaded: unknown = await import(specifier);
    if (
        typeof loaded !== 'object'
        || loaded === null
        || !('createEngine' in loaded)
        || typeof loaded.createEngine !== 'function'
    ) {
        throw new Error(`${specifier} does not export createEngine()`);
    }

    const engine: unknown = loaded.createEngine();
    if (!isFormattingEngine(engine)) {
        throw new Error(`createEngine() in ${specifier} did not return a formatting engine`);
    }
    return engine;
}

const port = parentPort;
if (port === null) {
    throw new Error('engine-thread must run inside a worker thread');
}

const { engineModule } = WorkerDataSchema.parse(workerData);
const engine = await loadEngine(engineModule);

async function format(message: unknown): Promise<FormatResult> {
    const { filePath, settings } = TaskRequestSchema.parse(message);
    return engine.format(filePath, Object.freeze(settings));
}

async function respond(message: unknown): Promise<void> {
    try {
        port?.postMessage({ result: await format(message) });
    } catch (error) {
        port?.postMessage({ crash: describeError(error) });
    }
}

port.on('message', (message: unknown) => {
    void respond(message);
});
