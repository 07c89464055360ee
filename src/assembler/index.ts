/**
 * Assembler
 *
 * Resolves symbolic assembly source into instruction words.
 */

export * from './parser.js';
export * from './assembler.js';
export * from './object-code.js';
export { main as runAssemblerCli } from './cli.js';
