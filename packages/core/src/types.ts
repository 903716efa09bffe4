/**
 * Core type definitions for reflow.
 *
 * These types describe the effective formatting settings, the entries produced
 * by input expansion, the per-file outcomes of a batch, and the interface a
 * formatting engine must implement. The orchestration core never looks inside
 * the engine; it only knows the `format` contract below.
 */

/**
 * How the engine indents nested lines.
 *
 * - auto: follow whatever the file already uses (tabs or spaces)
 * - spaces: `tabSpaces` spaces per level
 * - tabs: one tab character per level
 */
export type IndentationStyle = 'auto' | 'spaces' | 'tabs';

/**
 * Line ending written back to formatted files.
 * `auto` keeps the first line ending found in the file.
 */
export type NewlineStyle = 'auto' | 'unix' | 'windows' | 'native';

/**
 * The effective formatting configuration for one run.
 *
 * A single Settings value is resolved once per invocation and then shared
 * read-only by every task in the batch.
 */
export interface Settings {
    /** Maximum width of each line */
    readonly maxWidth: number;

    /** Number of spaces per indentation level */
    readonly tabSpaces: number;

    /** Engine-specific: indentation character */
    readonly indentationStyle: IndentationStyle;

    /** Engine-specific: line ending */
    readonly newlineStyle: NewlineStyle;
}

/**
 * Individual field overrides supplied on the command line.
 * Each one present replaces the resolved value, whatever its source.
 */
export interface SettingsOverrides {
    maxWidth?: number;
    tabSpaces?: number;
}

/**
 * A single result of expanding the input pattern.
 *
 * Expansion may find a path it cannot use (unreadable, vanished, broken link).
 * Those are carried as `error` entries so the batch can report them per file
 * instead of aborting.
 */
export type ExpandedEntry =
    | { kind: 'path'; path: string }
    | { kind: 'error'; path: string; message: string };

/**
 * What happened to one candidate path.
 */
export type TaskOutcome =
    | { status: 'success'; path: string }
    | { status: 'failure'; path: string; message: string };

/**
 * Aggregate of a finished batch.
 */
export interface BatchSummary {
    /** Number of candidate entries dispatched (equals the outcome count) */
    total: number;
    succeeded: number;
    failed: number;
    /** Whole milliseconds spent in dispatch-and-wait */
    durationMs: number;
}

/**
 * Value returned by an engine for one file.
 *
 * A structured error means the engine understood the file well enough to
 * refuse it (for example a syntax error). Anything thrown instead is treated
 * as abnormal termination.
 */
export type FormatResult =
    | { ok: true; text: string }
    | { ok: false; message: string };

/**
 * Interface that formatting engines must implement.
 *
 * The engine reads the file itself and returns the full formatted text. It must
 * not write to the file; the executor performs the write-back.
 */
export interface FormattingEngine {
    /** Unique identifier for this engine */
    readonly name: string;

    /** Human-readable description */
    readonly description: string;

    /**
     * File extensions (with the leading dot) this engine formats.
     * Used to build the recursive pattern when the input is a directory.
     */
    readonly extensions: readonly string[];

    /**
     * URL of a module exporting `createEngine()`, which returns an equivalent
     * engine. When set, the executor runs `format` on worker threads built
     * from that module; otherwise it calls this instance directly.
     */
    readonly workerModule?: string;

    /**
     * Format a single file.
     *
     * @param filePath - Absolute path to the file
     * @param settings - Shared, read-only settings for this run
     */
    format(filePath: string, settings: Settings): Promise<FormatResult>;
}
