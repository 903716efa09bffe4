/**
 * Config file discovery.
 *
 * Walks from the working directory up to the filesystem root looking for the
 * conventionally named config file, and returns the first one found.
 */

import * as path from 'node:path';
import * as fs from 'node:fs/promises';

/**
 * Name of the config file searched for in ancestor directories.
 */
export const CONFIG_FILE_NAME = 'reflow.toml';

/**
 * Options for config discovery.
 */
export interface ConfigDiscoveryOptions {
    /** Directory to start from. Defaults to the process working directory. */
    cwd?: string;

    /** File name to look for. Defaults to {@link CONFIG_FILE_NAME}. */
    fileName?: string;

    /** Called once with the path of the file that was found. */
    onDiscovered?: (configPath: string) => void;
}

/**
 * Yield `start` and then each of its parent directories, ending at the root.
 *
 * The sequence is finite: it stops at the first directory that is its own
 * parent, so a start at depth D yields exactly D + 1 directories.
 */
export function* ancestors(start: string): Generator<string, void, undefined> {
    let dir = path.resolve(start);
    while (true) {
        yield dir;
        const parent = path.dirname(dir);
        if (parent === dir) {
            return;
        }
        dir = parent;
    }
}

/**
 * Find the nearest config file at or above the working directory.
 *
 * An access error at any level counts as "not there"; discovery never fails.
 *
 * @returns Absolute path of the config file, or undefined when none exists
 */
export async function findConfigFile(
    options: ConfigDiscoveryOptions = {}
): Promise<string | undefined> {
    const fileName = options.fileName ?? CONFIG_FILE_NAME;

    let start: string;
    try {
        start = options.cwd ?? process.cwd();
    } catch {
        // Working directory was removed underneath us
        return undefined;
    }

    for (const dir of ancestors(start)) {
        const candidate = path.join(dir, fileName);
        if (await isFile(candidate)) {
            options.onDiscovered?.(candidate);
            return candidate;
        }
    }

    return undefined;
}

async function isFile(filePath: string): Promise<boolean> {
    try {
        const stats = await fs.stat(filePath);
        return stats.isFile();
    } catch {
        return false;
    }
}
