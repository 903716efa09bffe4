/**
 * Layout normalization for brace-delimited source.
 *
 * Re-indents lines by bracket depth, strips trailing whitespace, wraps long
 * line comments and normalizes line endings. The output is stable: formatting
 * it again with the same settings returns it unchanged.
 */

import * as os from 'node:os';
import type { FormatResult, IndentationStyle, NewlineStyle, Settings } from '@reflow/core';

const OPENERS: Record<string, string> = { '{': '}', '[': ']', '(': ')' };
const CLOSERS = new Set(['}', ']', ')']);

interface OpenBracket {
    char: string;
    line: number;
}

/**
 * Lexical state carried from one line to the next.
 */
interface ScanState {
    stack: OpenBracket[];
    inString: boolean;
    commentDepth: number;
}

class LayoutError extends Error {}

/**
 * Format source text.
 *
 * @returns The formatted text, or a structured error for unbalanced input
 */
export function formatSource(source: string, settings: Settings): FormatResult {
    try {
        return { ok: true, text: layout(source, settings) };
    } catch (error) {
        if (error instanceof LayoutError) {
            return { ok: false, message: error.message };
        }
        throw error;
    }
}

/**
 * One source line after scanning.
 *
 * `verbatim` lines continue a string literal or block comment and keep their
 * leading text; `code` lines are re-indented to `level`.
 */
type ScannedLine =
    | { kind: 'blank' }
    | { kind: 'verbatim'; text: string }
    | { kind: 'code'; level: number; body: string; leading: string };

function layout(source: string, settings: Settings): string {
    const newline = pickNewline(source, settings.newlineStyle);
    const scanned = scanLines(source.split(/\r?\n/));
    const indentUnit = pickIndentUnit(scanned, settings.indentationStyle, settings.tabSpaces);

    const out: string[] = [];
    for (const line of scanned) {
        if (line.kind === 'blank') {
            out.push('');
        } else if (line.kind === 'verbatim') {
            out.push(line.text);
        } else {
            out.push(...wrapComment(indentUnit.repeat(line.level), line.body, line.level, settings));
        }
    }

    while (out.length > 0 && out[out.length - 1] === '') {
        out.pop();
    }
    return out.length === 0 ? '' : out.join(newline) + newline;
}

function scanLines(lines: string[]): ScannedLine[] {
    const state: ScanState = { stack: [], inString: false, commentDepth: 0 };

    const scanned = lines.map((line, index): ScannedLine => {
        const lineNumber = index + 1;

        if (state.inString || state.commentDepth > 0) {
            scanLine(line, lineNumber, state);
            // Trailing whitespace inside a string literal is content
            return { kind: 'verbatim', text: state.inString ? line : line.trimEnd() };
        }

        const content = line.trimStart();
        if (content.length === 0) {
            return { kind: 'blank' };
        }

        const level = Math.max(0, state.stack.length - leadingClosers(content));
        scanLine(content, lineNumber, state);

        return {
            kind: 'code',
            level,
            body: state.inString ? content : content.trimEnd(),
            leading: line.slice(0, line.length - content.length),
        };
    });

    if (state.inString) {
        throw new LayoutError('unterminated string literal');
    }
    if (state.commentDepth > 0) {
        throw new LayoutError('unterminated block comment');
    }
    const unclosed = state.stack[state.stack.length - 1];
    if (unclosed) {
        throw new LayoutError(
            `unclosed delimiter \`${unclosed.char}\` opened at line ${unclosed.line}`
        );
    }

    return scanned;
}

/**
 * Advance the lexical state over one line, tracking brackets outside of
 * strings, character literals and comments.
 */
function scanLine(line: string, lineNumber: number, state: ScanState): void {
    let i = 0;
    while (i < line.length) {
        const ch = line[i];
        const next = line[i + 1];

        if (state.commentDepth > 0) {
            if (ch === '*' && next === '/') {
                state.commentDepth--;
                i += 2;
            } else if (ch === '/' && next === '*') {
                state.commentDepth++;
                i += 2;
            } else {
                i++;
            }
            continue;
        }

        if (state.inString) {
            if (ch === '\\') {
                i += 2;
            } else {
                if (ch === '"') state.inString = false;
                i++;
            }
            continue;
        }

        if (ch === '/' && next === '/') {
            return;
        }
        if (ch === '/' && next === '*') {
            state.commentDepth++;
            i += 2;
            continue;
        }
        if (ch === '"') {
            state.inString = true;
            i++;
            continue;
        }
        if (ch === '\'') {
            i += charLiteralLength(line, i);
            continue;
        }
        if (ch in OPENERS) {
            state.stack.push({ char: ch, line: lineNumber });
        } else if (CLOSERS.has(ch)) {
            const open = state.stack.pop();
            if (!open || OPENERS[open.char] !== ch) {
                throw new LayoutError(`unexpected token \`${ch}\` at line ${lineNumber}`);
            }
        }
        i++;
    }
}

/**
 * Length of a character literal starting at `start`, or 1 when the quote
 * begins a lifetime or label instead.
 */
function charLiteralLength(line: string, start: number): number {
    if (line[start + 1] === '\\') {
        const close = line.indexOf('\'', start + 3);
        return close !== -1 && close - start <= 10 ? close - start + 1 : 1;
    }
    return line[start + 2] === '\'' ? 3 : 1;
}

function leadingClosers(content: string): number {
    let count = 0;
    while (count < content.length && CLOSERS.has(content[count])) {
        count++;
    }
    return count;
}

/**
 * Split an over-long line comment at word boundaries. Other lines pass through.
 */
function wrapComment(indent: string, body: string, level: number, settings: Settings): string[] {
    const line = indent + body;
    const prefixMatch = /^\/\/[/!]?/.exec(body);
    const indentWidth = level * settings.tabSpaces;
    if (!prefixMatch || indentWidth + body.length <= settings.maxWidth) {
        return [line];
    }

    const prefix = prefixMatch[0];
    const words = body.slice(prefix.length).split(/\s+/).filter(word => word.length > 0);
    if (words.length === 0) {
        return [line];
    }

    const lead = `${prefix} `;
    const wrapped: string[] = [];
    let current = '';
    for (const word of words) {
        const candidate = current.length === 0 ? word : `${current} ${word}`;
        if (current.length > 0 && indentWidth + lead.length + candidate.length > settings.maxWidth) {
            wrapped.push(indent + lead + current);
            current = word;
        } else {
            current = candidate;
        }
    }
    wrapped.push(indent + lead + current);
    return wrapped;
}

function pickNewline(source: string, style: NewlineStyle): string {
    switch (style) {
        case 'unix':
            return '\n';
        case 'windows':
            return '\r\n';
        case 'native':
            return os.EOL;
        case 'auto': {
            const first = source.indexOf('\n');
            return first > 0 && source[first - 1] === '\r' ? '\r\n' : '\n';
        }
    }
}

/**
 * Indentation for one level. `auto` follows the first indented code line.
 */
function pickIndentUnit(lines: ScannedLine[], style: IndentationStyle, tabSpaces: number): string {
    const spaces = ' '.repeat(tabSpaces);
    if (style === 'spaces') return spaces;
    if (style === 'tabs') return '\t';

    for (const line of lines) {
        if (line.kind === 'code' && line.leading.length > 0) {
            return line.leading.startsWith('\t') ? '\t' : spaces;
        }
    }
    return spaces;
}
