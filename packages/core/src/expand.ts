/**
 * Input expansion.
 *
 * Turns the single input string into candidate file paths. A directory means
 * "every source file beneath it", an existing file means itself, and anything
 * else is evaluated as a glob pattern.
 */

import fastGlob from 'fast-glob';
import picomatch from 'picomatch';
import * as path from 'node:path';
import * as fs from 'node:fs/promises';
import * as fsCallback from 'node:fs';
import { describeError, PatternError } from './errors.js';
import type { ExpandedEntry } from './types.js';

/**
 * Options for input expansion.
 */
export interface ExpandOptions {
    /** Base directory for relative inputs. Defaults to the process working directory. */
    cwd?: string;

    /** Source file extensions (with leading dot) used for directory inputs */
    extensions: readonly string[];
}

/**
 * Build the glob pattern for an input.
 *
 * Directories become a recursive wildcard over the source extensions; existing
 * files are escaped so their names are matched literally.
 */
export async function toGlobPattern(
    input: string,
    options: ExpandOptions
): Promise<string> {
    const cwd = options.cwd ?? process.cwd();
    const kind = await pathKind(path.resolve(cwd, input));

    if (kind === 'directory') {
        const dir = fastGlob.convertPathToPattern(stripTrailingSeparators(input));
        return `${dir}/**/*${extensionGlob(options.extensions)}`;
    }
    if (kind === 'file') {
        return fastGlob.convertPathToPattern(input);
    }
    return input;
}

/**
 * Expand an input string into candidate entries.
 *
 * Entries are absolute and sorted. A match that cannot be read and written,
 * or a directory the walk cannot list, is returned as an `error` entry rather
 * than failing the expansion.
 *
 * @throws PatternError when the pattern is not valid glob syntax
 */
export async function expandInput(
    input: string,
    options: ExpandOptions
): Promise<ExpandedEntry[]> {
    const cwd = options.cwd ?? process.cwd();
    const pattern = await toGlobPattern(input, options);

    assertValidPattern(pattern);

    const unreadable: DirectoryError[] = [];
    const matches = await fastGlob(pattern, {
        cwd,
        absolute: true,
        dot: true,
        onlyFiles: true,
        unique: true,
        suppressErrors: true,
        throwErrorOnBrokenSymbolicLink: false,
        fs: { readdir: createRecordingReaddir(unreadable) },
    });

    const entries: ExpandedEntry[] = [
        ...await Promise.all(matches.map(accessEntry)),
        ...unreadable.map(({ path: dir, message }): ExpandedEntry => ({ kind: 'error', path: dir, message })),
    ];
    return entries.sort((a, b) => a.path.localeCompare(b.path));
}

/**
 * A directory the walk could not list.
 */
export interface DirectoryError {
    path: string;
    message: string;
}

type NamesCallback = (error: NodeJS.ErrnoException | null, names: string[]) => void;
type DirentsCallback = (error: NodeJS.ErrnoException | null, entries: fsCallback.Dirent[]) => void;

/**
 * Build a `readdir` for fast-glob that records directories it cannot list
 * and reports them as empty, so the rest of the walk carries on.
 *
 * A directory that vanished mid-walk (`ENOENT`) is passed through; fast-glob
 * already skips those.
 */
export function createRecordingReaddir(errors: DirectoryError[]) {
    const recorded = (dir: string, error: NodeJS.ErrnoException | null): boolean => {
        if (error === null || error.code === 'ENOENT') {
            return false;
        }
        errors.push({ path: dir, message: error.message });
        return true;
    };

    function readdir(dir: string, options: { withFileTypes: true }, callback: DirentsCallback): void;
    function readdir(dir: string, callback: NamesCallback): void;
    function readdir(
        dir: string,
        optionsOrCallback: { withFileTypes: true } | NamesCallback,
        callback?: DirentsCallback
    ): void {
        if (typeof optionsOrCallback === 'function') {
            fsCallback.readdir(dir, (error, names) => {
                if (recorded(dir, error)) {
                    optionsOrCallback(null, []);
                } else {
                    optionsOrCallback(error, names);
                }
            });
            return;
        }
        fsCallback.readdir(dir, { withFileTypes: true }, (error, entries) => {
            if (recorded(dir, error)) {
                callback?.(null, []);
            } else {
                callback?.(error, entries);
            }
        });
    }

    return readdir;
}

/**
 * Reject patterns with imbalanced brackets, braces or parentheses.
 *
 * @throws PatternError
 */
export function assertValidPattern(pattern: string): void {
    try {
        picomatch.makeRe(pattern, { strictBrackets: true });
    } catch (error) {
        throw new PatternError(
            pattern,
            `Invalid glob pattern "${pattern}": ${describeError(error)}`,
            { cause: error }
        );
    }
}

/**
 * Check that a matched file can be read and written back.
 */
export async function accessEntry(filePath: string): Promise<ExpandedEntry> {
    try {
        await fs.access(filePath, fs.constants.R_OK | fs.constants.W_OK);
        return { kind: 'path', path: filePath };
    } catch (error) {
        return { kind: 'error', path: filePath, message: describeError(error) };
    }
}

function extensionGlob(extensions: readonly string[]): string {
    const names = extensions.map(ext => ext.replace(/^\./, ''));
    if (names.length === 1) {
        return `.${names[0]}`;
    }
    return `.{${names.join(',')}}`;
}

// "/" becomes "", which still yields "/**/..." for the root
function stripTrailingSeparators(input: string): string {
    return input.replace(/[\\/]+$/, '');
}

async function pathKind(target: string): Promise<'directory' | 'file' | 'missing'> {
    try {
        const stats = await fs.stat(target);
        if (stats.isDirectory()) return 'directory';
        return stats.isFile() ? 'file' : 'missing';
    } catch {
        return 'missing';
    }
}
