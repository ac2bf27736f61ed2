/**
 * @plinth/cli
 *
 * Operator command-line interface. The executable lives in src/bin/plinth.ts;
 * this entry exposes the program builder and runtime for embedding and tests.
 */

export { createProgram } from './commands/index.js';
export { firstPartyCatalog } from './catalog.js';
export type { GlobalOptions, Runtime } from './runtime.js';
export { openRuntime } from './runtime.js';
