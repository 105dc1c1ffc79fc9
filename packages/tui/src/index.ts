/**
 * @tessera/tui - double-buffered terminal rendering engine
 *
 * Applications draw into a cell canvas each cycle; the terminal driver diffs
 * it against the previous cycle and writes only what changed.
 */

export * from './rect.js';
export * from './style.js';
export * from './cell.js';
export * from './canvas.js';
export * from './diff.js';
export * from './drawable.js';
export * from './text.js';
export * from './widgets.js';
export * from './frame.js';
export * from './backend.js';
export * from './terminal.js';
export * from './errors.js';
export * from './logger.js';
export { AnsiBackend, type AnsiBackendOptions, type TerminalOutput } from './backends/ansi-backend.js';
export { TestBackend, type BackendCall } from './backends/test-backend.js';
export { Program } from './program.js';
export * from './commands.js';
export * from './types.js';
