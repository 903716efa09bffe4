/**
 * Errors that abort a whole run.
 *
 * Anything that goes wrong for a single file is reported as a TaskOutcome
 * instead; only the classes below stop the run before files are touched.
 */

export class FatalError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'FatalError';
    }
}

/**
 * The explicit or discovered config file could not be read or deserialized.
 */
export class ConfigError extends FatalError {
    readonly filePath: string;

    constructor(filePath: string, message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'ConfigError';
        this.filePath = filePath;
    }
}

/**
 * The input pattern is not valid glob syntax.
 */
export class PatternError extends FatalError {
    readonly pattern: string;

    constructor(pattern: string, message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'PatternError';
        this.pattern = pattern;
    }
}

/**
 * Best available description of a thrown value.
 */
export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
