/**
 * Triangulator CLI
 *
 * @module cli
 */

export * from './lib/index.js';
export * from './commands/index.js';
export { createProgram, getVersion, CLI_NAME, type GlobalOptions } from './program.js';
