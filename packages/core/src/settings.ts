/**
 * Built-in default settings and the schema of the persisted config file.
 */

import { z } from 'zod';
import type { Settings } from './types.js';

/**
 * Build the default Settings value.
 *
 * Callers construct this once at startup and pass it down explicitly.
 */
export function createDefaultSettings(): Settings {
    return Object.freeze({
        maxWidth: 100,
        tabSpaces: 4,
        indentationStyle: 'auto',
        newlineStyle: 'auto',
    });
}

/**
 * Shape of `reflow.toml`.
 *
 * Keys are snake_case and every key is optional; a missing key keeps the
 * default for that field. Unknown keys are rejected.
 */
export const SettingsFileSchema = z
    .object({
        max_width: z.number().int().positive().optional(),
        tab_spaces: z.number().int().positive().optional(),
        indentation_style: z.enum(['auto', 'spaces', 'tabs']).optional(),
        newline_style: z.enum(['auto', 'unix', 'windows', 'native']).optional(),
    })
    .strict();

export type SettingsFile = z.infer<typeof SettingsFileSchema>;

/**
 * Shape of a resolved Settings value, for values crossing a thread boundary.
 */
export const SettingsSchema = z.object({
    maxWidth: z.number().int().positive(),
    tabSpaces: z.number().int().positive(),
    indentationStyle: z.enum(['auto', 'spaces', 'tabs']),
    newlineStyle: z.enum(['auto', 'unix', 'windows', 'native']),
});

/**
 * Lay a validated config file over a base Settings value.
 */
export function applySettingsFile(base: Settings, file: SettingsFile): Settings {
    return Object.freeze({
        maxWidth: file.max_width ?? base.maxWidth,
        tabSpaces: file.tab_spaces ?? base.tabSpaces,
        indentationStyle: file.indentation_style ?? base.indentationStyle,
        newlineStyle: file.newline_style ?? base.newlineStyle,
    });
}
