// Word Machine: a predicated 32-bit instruction set, its CPU, and a two-pass assembler

export * from './isa/bitfield.js';
export * from './isa/instruction.js';
export * from './emulator/index.js';
export * from './assembler/index.js';
