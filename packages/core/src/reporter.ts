/**
 * Console reporting for a batch.
 */

import chalk from 'chalk';
import * as path from 'node:path';
import type { BatchSummary, TaskOutcome } from './types.js';

/**
 * Where reporter lines go. `console` satisfies this.
 */
export interface ReporterOutput {
    log(line: string): void;
    error(line: string): void;
}

export interface ReporterOptions {
    /** Defaults to `console` */
    output?: ReporterOutput;

    /** Paths are printed relative to this directory */
    basePath?: string;

    /** Colourize output. Defaults to true. */
    color?: boolean;
}

type Paint = (s: string) => string;

const plain: Paint = s => s;

/**
 * Prints one line per outcome as it arrives, then the summary.
 */
export class ResultReporter {
    private readonly output: ReporterOutput;
    private readonly basePath: string | undefined;
    private readonly red: Paint;
    private readonly dim: Paint;
    private readonly blue: Paint;

    constructor(options: ReporterOptions = {}) {
        this.output = options.output ?? console;
        this.basePath = options.basePath;

        const useColor = options.color !== false;
        this.red = useColor ? chalk.red : plain;
        this.dim = useColor ? chalk.dim : plain;
        this.blue = useColor ? chalk.blue : plain;
    }

    /**
     * Report a completed task. Failures get a second, diagnostic line on stderr.
     */
    outcome(outcome: TaskOutcome): void {
        const shown = this.displayPath(outcome.path);
        if (outcome.status === 'success') {
            this.output.log(`✅ ${shown}`);
            return;
        }
        this.output.log(`❌ ${this.red(shown)}`);
        this.output.error(`\t\t${this.dim(outcome.message)}`);
    }

    /**
     * Report the finished batch. Call after every outcome.
     */
    summary(summary: BatchSummary): void {
        this.output.log(this.blue(`Formatted ${summary.total} files in ${summary.durationMs} ms`));
    }

    private displayPath(filePath: string): string {
        if (this.basePath === undefined) {
            return filePath;
        }
        const relative = path.relative(this.basePath, filePath);
        return relative.length > 0 && !relative.startsWith('..') ? relative : filePath;
    }
}
