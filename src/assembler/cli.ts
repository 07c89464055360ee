#!/usr/bin/env node
/**
 * Assembler CLI
 *
 * Usage: wm-asm [source.asm] [output] [--object] [--error-limit N] [--verbose]
 */

import { readFileSync, writeFileSync } from 'fs';
import { resolve } from 'path';
import { fileURLToPath } from 'url';
import { Assembler, DEFAULT_ERROR_LIMIT } from './assembler.js';
import { formatObjectCode } from './object-code.js';

interface CliOptions {
  /** Undefined reads standard input */
  inputFile?: string;
  /** Undefined writes standard output */
  outputFile?: string;
  object: boolean;
  errorLimit: number;
  verbose: boolean;
}

function parseArgs(args: string[]): CliOptions | null {
  const cliArgs = args.slice(2); // Skip node and script path
  const positional: string[] = [];
  let object = false;
  let verbose = false;
  let errorLimit = DEFAULT_ERROR_LIMIT;

  for (let i = 0; i < cliArgs.length; i++) {
    const arg = cliArgs[i];

    if (arg === '--object') {
      object = true;
    } else if (arg === '--verbose' || arg === '-v') {
      verbose = true;
    } else if (arg === '--error-limit') {
      const value = cliArgs[++i];
      if (value === undefined || !/^[0-9]+$/.test(value)) {
        console.error('Error: --error-limit requires a non-negative integer');
        return null;
      }
      errorLimit = parseInt(value, 10);
    } else if (arg === '-h' || arg === '--help') {
      return null;
    } else if (arg === '-' || !arg.startsWith('-')) {
      positional.push(arg);
    } else {
      console.error(`Error: Unknown option '${arg}'`);
      return null;
    }
  }

  if (positional.length > 2) {
    console.error('Error: Too many arguments');
    return null;
  }

  // '-' stands for the standard stream
  const [inputFile, outputFile] = positional.map((p) => (p === '-' ? undefined : p));
  return { inputFile, outputFile, object, errorLimit, verbose };
}

function printUsage(): void {
  console.log(`Word Machine Assembler

Usage: wm-asm [source.asm] [output] [options]

Reads source (default: standard input) and writes the resolved assembly, or
object code with --object, to output (default: standard output).

Options:
  --object             Write object code (one hex word per line)
  --error-limit <n>    Abandon assembly after more than n errors (default: ${DEFAULT_ERROR_LIMIT})
  -v, --verbose        Log assembler passes
  -h, --help           Show this help message

Examples:
  wm-asm program.asm
  wm-asm program.asm program.obj --object
  cat program.asm | wm-asm - resolved.asm`);
}

export function main(args: string[] = process.argv): number {
  const options = parseArgs(args);

  if (!options) {
    printUsage();
    return args.some((a) => a === '-h' || a === '--help') ? 0 : 1;
  }

  const sourceName = options.inputFile ?? '<stdin>';
  let source: string;
  try {
    source = readFileSync(options.inputFile ?? 0, 'utf-8');
  } catch (e: unknown) {
    const code = e instanceof Error && 'code' in e ? e.code : undefined;
    if (code === 'ENOENT') {
      console.error(`Error: File not found: ${sourceName}`);
    } else {
      console.error(`Error: Cannot read file: ${sourceName}`);
    }
    return 1;
  }

  const assembler = new Assembler(source, {
    errorLimit: options.errorLimit,
    verbose: options.verbose,
    log: (message) => console.error(message),
  });
  const result = assembler.assemble();

  for (const error of result.errors) {
    console.error(`${sourceName}:${error.line}: ${error.message}`);
  }
  if (result.aborted) {
    console.error('Too many errors; abandoning');
  }
  if (result.errors.length > 0) {
    return 1;
  }

  const output = options.object ? formatObjectCode(result.words) : result.resolved.join('\n');

  if (options.outputFile === undefined) {
    console.log(output);
    return 0;
  }

  try {
    writeFileSync(options.outputFile, output + '\n');
  } catch {
    console.error(`Error: Cannot write file: ${options.outputFile}`);
    return 1;
  }

  if (options.verbose) {
    console.error(`Assembled ${result.words.length} words to ${options.outputFile}`);
  }
  return 0;
}

// Run if executed directly
if (process.argv[1] && resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  process.exit(main());
}
