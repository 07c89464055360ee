/**
 * Assembler
 *
 * Two-pass assembler. Pass 1 builds the symbol table (label -> address).
 * Pass 2 rewrites symbolic LOAD/STORE/JUMP lines into fully specified
 * instructions with PC-relative displacements and encodes every line that
 * occupies a memory word.
 *
 * Symbolic forms resolve through r15, which holds the address of the
 * instruction being executed when its operands are read:
 *
 *   LOAD/P  r1,var      ->  LOAD/P  r1,r0,r15[var - here]
 *   STORE   r1,var      ->  STORE/ALWAYS r1,r0,r15[var - here]
 *   JUMP/Z  loop        ->  ADD/Z   r15,r0,r15[loop - here]
 *
 * Errors are collected per line. Once more than `errorLimit` have been
 * recorded, assembly is abandoned.
 */

import {
  OFFSET_MAX,
  OFFSET_MIN,
  PC_REGISTER,
  ZERO_REGISTER,
  instructionFromFields,
} from '../isa/instruction.js';
import { AsmSyntaxError, DEFAULT_PREDICATE, LineKind, parseLine } from './parser.js';
import type { AsmLine, DataLine, FullLine, SymbolicLine } from './parser.js';

export interface AssemblerError {
  message: string;
  line: number;
}

export interface AssemblerResult {
  /** Source lines in order, with symbolic lines rewritten */
  resolved: string[];
  /** One word per instruction or DATA line */
  words: number[];
  symbols: Map<string, number>;
  errors: AssemblerError[];
  /** True if assembly stopped early on too many errors */
  aborted: boolean;
}

export interface AssemblerOptions {
  // Give up once the error count exceeds this
  errorLimit: number;
  // Log pass summaries and resolved lines through `log`
  verbose: boolean;
  log: (message: string) => void;
}

export const DEFAULT_ERROR_LIMIT = 5;

const DEFAULT_OPTIONS: AssemblerOptions = {
  errorLimit: DEFAULT_ERROR_LIMIT,
  verbose: false,
  log: (message) => console.log(message),
};

export class DuplicateLabelError extends Error {
  constructor(public label: string, public firstAddress: number) {
    super(`Duplicate label '${label}' (first defined at address ${firstAddress})`);
    this.name = 'DuplicateLabelError';
  }
}

export class UnresolvedLabelError extends Error {
  constructor(public label: string) {
    super(`Unknown label '${label}'`);
    this.name = 'UnresolvedLabelError';
  }
}

export class DisplacementRangeError extends Error {
  constructor(public label: string, public displacement: number) {
    super(
      `Label '${label}' is ${displacement} words away; displacement must be in [${OFFSET_MIN}, ${OFFSET_MAX}]`
    );
    this.name = 'DisplacementRangeError';
  }
}

class TooManyErrors extends Error {
  constructor() {
    super('Too many errors; abandoning');
    this.name = 'TooManyErrors';
  }
}

interface SourceLine {
  /** 1-based */
  number: number;
  text: string;
  /** Null when the line failed to parse in pass 1 */
  parsed: AsmLine | null;
}

export class Assembler {
  private lines: SourceLine[] = [];
  private symbols: Map<string, number> = new Map();
  private errors: AssemblerError[] = [];
  private resolved: string[] = [];
  private words: number[] = [];
  private readonly options: AssemblerOptions;

  constructor(
    private source: string,
    options: Partial<AssemblerOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  assemble(): AssemblerResult {
    this.lines = [];
    this.symbols = new Map();
    this.errors = [];
    this.resolved = [];
    this.words = [];

    let aborted = false;
    try {
      this.pass1();
      this.pass2();
    } catch (e: unknown) {
      if (!(e instanceof TooManyErrors)) {
        throw e;
      }
      aborted = true;
    }

    return {
      resolved: this.resolved,
      words: this.words,
      symbols: this.symbols,
      errors: this.errors,
      aborted,
    };
  }

  /**
   * Build the symbol table: every label maps to the address of its line.
   * Each non-comment line occupies one word.
   */
  private pass1(): void {
    const texts = this.source.split(/\r?\n/);
    // A trailing newline does not start another line
    if (texts.length > 1 && texts[texts.length - 1] === '') {
      texts.pop();
    }

    let address = 0;
    for (const [index, text] of texts.entries()) {
      const line: SourceLine = { number: index + 1, text, parsed: null };
      this.lines.push(line);

      try {
        line.parsed = parseLine(text);
      } catch (e: unknown) {
        this.recordError(line.number, e);
        continue;
      }

      const { label } = line.parsed;
      if (label !== undefined) {
        const existing = this.symbols.get(label);
        if (existing !== undefined) {
          this.recordError(line.number, new DuplicateLabelError(label, existing));
        } else {
          this.symbols.set(label, address);
        }
      }

      if (line.parsed.kind !== LineKind.COMMENT) {
        address++;
      }
    }

    if (this.options.verbose) {
      this.options.log(`Pass 1: ${this.symbols.size} labels, ${address} words`);
    }
  }

  private pass2(): void {
    let address = 0;

    for (const line of this.lines) {
      const parsed = line.parsed;
      if (parsed === null) continue;

      try {
        switch (parsed.kind) {
          case LineKind.COMMENT:
            this.resolved.push(line.text);
            break;
          case LineKind.FULL:
            this.words.push(this.encodeFull(parsed));
            this.resolved.push(line.text);
            break;
          case LineKind.DATA:
            this.words.push(this.encodeData(parsed));
            this.resolved.push(line.text);
            break;
          case LineKind.SYMBOLIC: {
            const text = this.resolveSymbolic(parsed, address);
            const full = parseLine(text);
            if (full.kind !== LineKind.FULL) {
              throw new AsmSyntaxError(`Resolved line is not a full instruction: '${text}'`);
            }
            this.words.push(this.encodeFull(full));
            this.resolved.push(text);
            if (this.options.verbose) {
              this.options.log(`${line.number}: ${line.text.trim()} => ${text}`);
            }
            break;
          }
        }
      } catch (e: unknown) {
        this.recordError(line.number, e);
      }

      if (parsed.kind !== LineKind.COMMENT) {
        address++;
      }
    }

    if (this.options.verbose) {
      this.options.log(`Pass 2: ${this.words.length} words, ${this.errors.length} errors`);
    }
  }

  /**
   * Rewrite a symbolic line as a FULL line addressing the label relative to
   * the program counter
   */
  private resolveSymbolic(line: SymbolicLine, address: number): string {
    const labelAddress = this.symbols.get(line.symbol);
    if (labelAddress === undefined) {
      throw new UnresolvedLabelError(line.symbol);
    }

    const displacement = labelAddress - address;
    if (displacement < OFFSET_MIN || displacement > OFFSET_MAX) {
      throw new DisplacementRangeError(line.symbol, displacement);
    }

    const predicate = line.predicate ?? DEFAULT_PREDICATE;
    const operands = `r${ZERO_REGISTER},r${PC_REGISTER}[${displacement}]`;
    let instruction: string;

    if (line.opcode === 'JUMP') {
      if (line.target !== undefined) {
        throw new AsmSyntaxError('JUMP does not take a target register');
      }
      instruction = `ADD/${predicate} r${PC_REGISTER},${operands}`;
    } else {
      if (line.target === undefined) {
        throw new AsmSyntaxError(`${line.opcode} requires a target register`);
      }
      instruction = `${line.opcode}/${predicate} ${line.target},${operands}`;
    }

    const label = line.label !== undefined ? `${line.label}: ` : '';
    const comment = line.comment !== undefined ? ` ${line.comment}` : '';
    return `${label}${instruction}${comment}`;
  }

  private encodeFull(line: FullLine): number {
    return instructionFromFields(line).encode();
  }

  private encodeData(line: DataLine): number {
    if (!Number.isSafeInteger(line.value) || line.value < -0x80000000 || line.value > 0xffffffff) {
      throw new RangeError(`DATA value ${line.value} does not fit in a word`);
    }
    return line.value >>> 0;
  }

  private recordError(line: number, e: unknown): void {
    const message = e instanceof Error ? e.message : String(e);
    this.errors.push({ line, message });
    if (this.errors.length > this.options.errorLimit) {
      throw new TooManyErrors();
    }
  }
}
