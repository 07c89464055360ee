/**
 * Word Machine Emulator
 */

export * from './alu.js';
export * from './register.js';
export * from './memory.js';
export * from './cpu.js';
export { main as runRunnerCli } from './cli.js';
