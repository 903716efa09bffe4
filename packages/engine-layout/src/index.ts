/**
 * @reflow/engine-layout
 *
 * Default formatting engine for reflow: re-indents brace-delimited source by
 * nesting depth and normalizes whitespace and line endings.
 */

export { createEngine, LayoutEngine, type LayoutEngineOptions } from './engine.js';
export { formatSource } from './layout.js';
