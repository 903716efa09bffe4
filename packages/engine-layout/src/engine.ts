/**
 * Layout formatting engine.
 *
 * Reads a source file and returns its normalized layout. Read failures and
 * unbalanced input come back as structured errors; the executor decides what
 * to do with the result.
 */

import * as fs from 'node:fs/promises';
import { describeError, type FormatResult, type FormattingEngine, type Settings } from '@reflow/core';
import { formatSource } from './layout.js';

export interface LayoutEngineOptions {
    /**
     * Extensions to format when the input is a directory.
     * Defaults to `.rs`.
     */
    extensions?: readonly string[];
}

export class LayoutEngine implements FormattingEngine {
    readonly name = 'layout';
    readonly description = 'Bracket-depth indentation and whitespace normalization';
    readonly extensions: readonly string[];
    readonly workerModule = import.meta.url;

    constructor(options: LayoutEngineOptions = {}) {
        this.extensions = options.extensions ?? ['.rs'];
    }

    async format(filePath: string, settings: Settings): Promise<FormatResult> {
        let source: string;
        try {
            source = await fs.readFile(filePath, 'utf-8');
        } catch (error) {
            return { ok: false, message: `failed to read ${filePath}: ${describeError(error)}` };
        }
        return formatSource(source, settings);
    }
}

/**
 * Worker-thread entry: each thread builds its own engine from this module.
 */
export function createEngine(): FormattingEngine {
    return new LayoutEngine();
}
