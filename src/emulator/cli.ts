#!/usr/bin/env node
/**
 * Program Runner CLI
 *
 * Usage: wm-run <program> [--source] [--input a,b,c] [--trace] [--step] [--memory N]
 *
 * Loads a program at address 0 and runs it until HALT. Address 510 reads the
 * next --input value and address 511 prints a value.
 */

import { readFileSync } from 'fs';
import { resolve } from 'path';
import { createInterface } from 'readline/promises';
import type { Readable } from 'stream';
import { fileURLToPath } from 'url';
import { Assembler } from '../assembler/assembler.js';
import { parseObjectCode } from '../assembler/object-code.js';
import { Cpu } from './cpu.js';
import { DEFAULT_MEMORY_SIZE, MemoryMappedIO, attachConsole } from './memory.js';

interface CliOptions {
  programFile: string;
  source: boolean;
  input: number[];
  trace: boolean;
  step: boolean;
  memorySize: number;
}

export class StepInputClosedError extends Error {
  constructor() {
    super('Input ended before the program halted');
    this.name = 'StepInputClosedError';
  }
}

function parseArgs(args: string[]): CliOptions | null {
  const cliArgs = args.slice(2); // Skip node and script path

  let programFile = '';
  let source = false;
  let input: number[] = [];
  let trace = false;
  let step = false;
  let memorySize = DEFAULT_MEMORY_SIZE;

  for (let i = 0; i < cliArgs.length; i++) {
    const arg = cliArgs[i];

    if (arg === '--source') {
      source = true;
    } else if (arg === '--trace') {
      trace = true;
    } else if (arg === '--step') {
      step = true;
    } else if (arg === '--input') {
      const value = cliArgs[++i];
      if (value === undefined || !/^-?[0-9]+(,-?[0-9]+)*$/.test(value)) {
        console.error('Error: --input requires a comma-separated list of integers');
        return null;
      }
      input = value.split(',').map((v) => parseInt(v, 10));
    } else if (arg === '--memory') {
      const value = cliArgs[++i];
      if (value === undefined || !/^[1-9][0-9]*$/.test(value)) {
        console.error('Error: --memory requires a positive integer');
        return null;
      }
      memorySize = parseInt(value, 10);
    } else if (arg === '-h' || arg === '--help') {
      return null;
    } else if (!arg.startsWith('-')) {
      programFile = arg;
    } else {
      console.error(`Error: Unknown option '${arg}'`);
      return null;
    }
  }

  if (!programFile) {
    console.error('Error: No program file specified');
    return null;
  }

  return { programFile, source, input, trace, step, memorySize };
}

function printUsage(): void {
  console.log(`Word Machine Runner

Usage: wm-run <program> [options]

Options:
  --source             Program is assembly source rather than object code
  --input <a,b,...>    Values returned by reads of address 510
  --trace              Log each instruction before it executes
  --step               Wait for Enter after each instruction
  --memory <n>         Memory size in words (default: ${DEFAULT_MEMORY_SIZE})
  -h, --help           Show this help message

Examples:
  wm-run program.obj
  wm-run program.asm --source --input 3,4 --trace`);
}

function loadProgram(options: CliOptions, text: string): number[] | null {
  if (!options.source) {
    return parseObjectCode(text);
  }

  const result = new Assembler(text).assemble();
  for (const error of result.errors) {
    console.error(`${options.programFile}:${error.line}: ${error.message}`);
  }
  if (result.aborted) {
    console.error('Too many errors; abandoning');
  }
  return result.errors.length > 0 ? null : result.words;
}

/**
 * Run the program one instruction per line read from `input`. Fails with
 * StepInputClosedError if the input ends while the machine is still running.
 */
async function runStepwise(cpu: Cpu, input: Readable): Promise<void> {
  const rl = createInterface({ input, output: process.stderr, terminal: false });
  const closed = new AbortController();
  rl.once('close', () => closed.abort());

  try {
    await cpu.runStepwise(0, async () => {
      if (closed.signal.aborted) {
        throw new StepInputClosedError();
      }
      try {
        await rl.question('', { signal: closed.signal });
      } catch (e: unknown) {
        if (closed.signal.aborted) {
          throw new StepInputClosedError();
        }
        throw e;
      }
    });
  } finally {
    rl.close();
  }
}

export async function main(
  args: string[] = process.argv,
  stepInput: Readable = process.stdin
): Promise<number> {
  const options = parseArgs(args);

  if (!options) {
    printUsage();
    return args.some((a) => a === '-h' || a === '--help') ? 0 : 1;
  }

  let text: string;
  try {
    text = readFileSync(options.programFile, 'utf-8');
  } catch (e: unknown) {
    const code = e instanceof Error && 'code' in e ? e.code : undefined;
    if (code === 'ENOENT') {
      console.error(`Error: File not found: ${options.programFile}`);
    } else {
      console.error(`Error: Cannot read file: ${options.programFile}`);
    }
    return 1;
  }

  const pending = [...options.input];

  try {
    const memory = new MemoryMappedIO(options.memorySize);
    attachConsole(memory, {
      input: () => pending.shift(),
      output: (value) => console.log(String(value)),
    });
    const cpu = new Cpu(memory, { verbose: options.trace, log: (message) => console.error(message) });

    const words = loadProgram(options, text);
    if (words === null) {
      return 1;
    }
    memory.load(words);

    if (options.step) {
      await runStepwise(cpu, stepInput);
    } else {
      cpu.run(0);
    }
  } catch (e: unknown) {
    const message = e instanceof Error ? `${e.name}: ${e.message}` : String(e);
    console.error(`Error: ${message}`);
    return 1;
  }

  return 0;
}

// Run if executed directly
if (process.argv[1] && resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  main().then(
    (code) => process.exit(code),
    (e: unknown) => {
      console.error(e);
      process.exit(1);
    }
  );
}
