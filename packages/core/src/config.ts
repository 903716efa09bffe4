/**
 * Settings resolution.
 *
 * Precedence, highest first:
 * 1. Individual field overrides (command-line flags)
 * 2. The explicit config file, or else the discovered one
 * 3. Built-in defaults
 */

import * as path from 'node:path';
import * as fs from 'node:fs/promises';
import { parse as parseToml } from 'smol-toml';
import { findConfigFile } from './discovery.js';
import { ConfigError, describeError } from './errors.js';
import { applySettingsFile, createDefaultSettings, SettingsFileSchema } from './settings.js';
import type { Settings, SettingsOverrides } from './types.js';

/**
 * Inputs to {@link resolveSettings}.
 */
export interface ResolveSettingsOptions {
    /**
     * Explicit config file. When given, discovery is not attempted.
     * Relative paths are resolved against `cwd`.
     */
    configFile?: string;

    /** Working directory for discovery and relative paths */
    cwd?: string;

    /** Name searched for during discovery. Defaults to `reflow.toml`. */
    configFileName?: string;

    /** Per-field overrides applied last */
    overrides?: SettingsOverrides;

    /** Base values used for anything the config file leaves out */
    defaults?: Settings;

    /** Called once when discovery finds a config file */
    onDiscovered?: (configPath: string) => void;
}

/**
 * Deserialize config file content into Settings.
 *
 * @param content - Raw TOML text
 * @param source - Path of the file, used in error messages
 * @param defaults - Values for keys the file does not set
 * @throws ConfigError when the content is not valid TOML or does not match the schema
 */
export function parseSettings(
    content: string,
    source: string,
    defaults: Settings = createDefaultSettings()
): Settings {
    let raw: unknown;
    try {
        raw = parseToml(content);
    } catch (error) {
        throw new ConfigError(
            source,
            `Invalid config file ${source}: ${describeError(error)}`,
            { cause: error }
        );
    }

    const result = SettingsFileSchema.safeParse(raw);
    if (!result.success) {
        const details = result.error.issues
            .map(issue => issue.path.length > 0
                ? `${issue.path.join('.')}: ${issue.message}`
                : issue.message)
            .join('; ');
        throw new ConfigError(source, `Invalid config file ${source}: ${details}`);
    }

    return applySettingsFile(defaults, result.data);
}

/**
 * Read and deserialize a config file.
 *
 * @throws ConfigError when the file cannot be read or parsed
 */
export async function loadSettingsFile(
    configPath: string,
    defaults: Settings = createDefaultSettings()
): Promise<Settings> {
    let content: string;
    try {
        content = await fs.readFile(configPath, 'utf-8');
    } catch (error) {
        throw new ConfigError(
            configPath,
            `Unable to read config file ${configPath}: ${describeError(error)}`,
            { cause: error }
        );
    }
    return parseSettings(content, configPath, defaults);
}

/**
 * Resolve the effective Settings for a run.
 *
 * The returned value is frozen and meant to be shared by every task.
 *
 * @throws ConfigError when a config file is selected but cannot be used
 */
export async function resolveSettings(
    options: ResolveSettingsOptions = {}
): Promise<Settings> {
    const cwd = options.cwd ?? process.cwd();
    const defaults = options.defaults ?? createDefaultSettings();

    const configPath = options.configFile !== undefined
        ? path.resolve(cwd, options.configFile)
        : await findConfigFile({
            cwd,
            fileName: options.configFileName,
            onDiscovered: options.onDiscovered,
        });

    const base = configPath !== undefined
        ? await loadSettingsFile(configPath, defaults)
        : defaults;

    return applyOverrides(base, options.overrides ?? {});
}

/**
 * Replace each overridden field. Never fails.
 */
export function applyOverrides(settings: Settings, overrides: SettingsOverrides): Settings {
    return Object.freeze({
        ...settings,
        maxWidth: overrides.maxWidth ?? settings.maxWidth,
        tabSpaces: overrides.tabSpaces ?? settings.tabSpaces,
    });
}
