/**
 * Instruction Format
 *
 * Instruction words are unsigned 32-bit integers with these fields,
 * from high-order to low-order bits:
 *
 *   reserved[31] | opcode[30:26] | cond[25:22] | target[21:18] |
 *   src1[17:14] | src2[13:10] | offset[9:0]
 *
 * The offset is signed (two's complement, -512..511); every other field is
 * unsigned.
 */

import { BitField } from './bitfield.js';

export const FIELDS = {
  reserved: new BitField(31, 31),
  opcode: new BitField(26, 30),
  cond: new BitField(22, 25),
  target: new BitField(18, 21),
  src1: new BitField(14, 17),
  src2: new BitField(10, 13),
  offset: new BitField(0, 9),
} as const;

export const REGISTER_COUNT = 16;
export const ZERO_REGISTER = 0;
export const PC_REGISTER = 15;

export const OFFSET_MIN = FIELDS.offset.minSigned;
export const OFFSET_MAX = FIELDS.offset.maxSigned;

/**
 * Operation codes. They drive both the ALU and the rest of the CPU.
 * Code 4 is unassigned.
 */
export enum OpCode {
  HALT = 0,
  LOAD = 1,
  STORE = 2,
  ADD = 3,
  SUB = 5,
  MUL = 6,
  DIV = 7,
}

/**
 * Condition flags. An instruction's condition mask and the CPU's condition
 * register share this layout, so ANDing them predicates the instruction.
 */
export const CondFlag = {
  NEVER: 0,
  M: 1, // minus
  Z: 2, // zero
  P: 4, // positive
  V: 8, // overflow (e.g. division by zero)
  ALWAYS: 15,
} as const;

/** A set of condition flags */
export type CondFlag = number;

const FLAG_BITS: ReadonlyArray<readonly [string, CondFlag]> = [
  ['M', CondFlag.M],
  ['Z', CondFlag.Z],
  ['P', CondFlag.P],
  ['V', CondFlag.V],
];

const OPCODES_BY_NAME: ReadonlyMap<string, OpCode> = new Map([
  ['HALT', OpCode.HALT],
  ['LOAD', OpCode.LOAD],
  ['STORE', OpCode.STORE],
  ['ADD', OpCode.ADD],
  ['SUB', OpCode.SUB],
  ['MUL', OpCode.MUL],
  ['DIV', OpCode.DIV],
]);

const OPCODES_BY_CODE: ReadonlyMap<number, OpCode> = new Map(
  [...OPCODES_BY_NAME.values()].map((op): [number, OpCode] => [op, op])
);

// Predicate letters as written in assembly source. N and M both mean negative.
const PREDICATE_LETTERS: ReadonlyMap<string, CondFlag> = new Map([
  ['N', CondFlag.M],
  ['M', CondFlag.M],
  ['Z', CondFlag.Z],
  ['P', CondFlag.P],
  ['V', CondFlag.V],
]);

// r0..r15, plus zero (r0) and pc (r15)
const NAMED_REGISTERS: ReadonlyMap<string, number> = new Map([
  ...Array.from({ length: REGISTER_COUNT }, (_, i): [string, number] => [`r${i}`, i]),
  ['zero', ZERO_REGISTER],
  ['pc', PC_REGISTER],
]);

export class DecodingError extends Error {
  constructor(message: string, public word: number) {
    super(`${message} in word 0x${word.toString(16).padStart(8, '0')}`);
    this.name = 'DecodingError';
  }
}

export class LookupError extends Error {
  constructor(public kind: 'opcode' | 'predicate' | 'register', public text: string) {
    super(`Unknown ${kind} '${text}'`);
    this.name = 'LookupError';
  }
}

export class InstructionRangeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InstructionRangeError';
  }
}

export function lookupOpCode(name: string): OpCode {
  const op = OPCODES_BY_NAME.get(name.toUpperCase());
  if (op === undefined) {
    throw new LookupError('opcode', name);
  }
  return op;
}

export function lookupRegister(name: string): number {
  const index = NAMED_REGISTERS.get(name.toLowerCase());
  if (index === undefined) {
    throw new LookupError('register', name);
  }
  return index;
}

/**
 * Parse a predicate such as `ALWAYS`, `NEVER`, `Z` or `NP`
 */
export function parseCondition(text: string): CondFlag {
  const upper = text.toUpperCase();
  if (upper === 'ALWAYS') return CondFlag.ALWAYS;
  if (upper === 'NEVER') return CondFlag.NEVER;
  if (upper.length === 0) {
    throw new LookupError('predicate', text);
  }

  let mask: CondFlag = CondFlag.NEVER;
  for (const letter of upper) {
    const bit = PREDICATE_LETTERS.get(letter);
    if (bit === undefined) {
      throw new LookupError('predicate', text);
    }
    mask |= bit;
  }
  return mask;
}

/**
 * Name of a condition mask: NEVER, ALWAYS, or its flag letters (e.g. `ZP`)
 */
export function formatCondition(cond: CondFlag): string {
  if (cond === CondFlag.NEVER) return 'NEVER';
  if (cond === CondFlag.ALWAYS) return 'ALWAYS';
  return FLAG_BITS.filter(([, bit]) => (cond & bit) !== 0)
    .map(([name]) => name)
    .join('');
}

/**
 * A decoded instruction. Memory holds plain words; the CPU decodes each one
 * into an Instruction before executing it.
 */
export class Instruction {
  constructor(
    readonly op: OpCode,
    readonly cond: CondFlag,
    readonly regTarget: number,
    readonly regSrc1: number,
    readonly regSrc2: number,
    readonly offset: number
  ) {
    if (!OPCODES_BY_CODE.has(op)) {
      throw new InstructionRangeError(`Undefined opcode ${op}`);
    }
    if (!Number.isInteger(cond) || cond < CondFlag.NEVER || cond > CondFlag.ALWAYS) {
      throw new InstructionRangeError(`Invalid condition mask ${cond}`);
    }
    for (const reg of [regTarget, regSrc1, regSrc2]) {
      if (!Number.isInteger(reg) || reg < 0 || reg >= REGISTER_COUNT) {
        throw new InstructionRangeError(`Register index ${reg} out of range`);
      }
    }
    if (!Number.isInteger(offset) || offset < OFFSET_MIN || offset > OFFSET_MAX) {
      throw new InstructionRangeError(
        `Offset ${offset} out of range [${OFFSET_MIN}, ${OFFSET_MAX}]`
      );
    }
  }

  encode(): number {
    let word = 0;
    word = FIELDS.opcode.insert(this.op, word);
    word = FIELDS.cond.insert(this.cond, word);
    word = FIELDS.target.insert(this.regTarget, word);
    word = FIELDS.src1.insert(this.regSrc1, word);
    word = FIELDS.src2.insert(this.regSrc2, word);
    word = FIELDS.offset.insert(this.offset, word);
    return word;
  }

  equals(other: Instruction): boolean {
    return (
      this.op === other.op &&
      this.cond === other.cond &&
      this.regTarget === other.regTarget &&
      this.regSrc1 === other.regSrc1 &&
      this.regSrc2 === other.regSrc2 &&
      this.offset === other.offset
    );
  }

  /**
   * Assembly-like rendering, e.g. `ADD/Z    r1,r2,r3[-14]`
   */
  toString(): string {
    // Suffix padded to 4 so operands line up in traces
    const cond = this.cond === CondFlag.ALWAYS ? '' : `/${formatCondition(this.cond)}`;
    return `${OpCode[this.op]}${cond.padEnd(4)}  r${this.regTarget},r${this.regSrc1},r${this.regSrc2}[${this.offset}]`;
  }
}

/**
 * Decode a memory word into an Instruction
 */
export function decode(word: number): Instruction {
  const code = FIELDS.opcode.extract(word);
  const op = OPCODES_BY_CODE.get(code);
  if (op === undefined) {
    throw new DecodingError(`Undefined opcode ${code}`, word >>> 0);
  }
  return new Instruction(
    op,
    FIELDS.cond.extract(word),
    FIELDS.target.extract(word),
    FIELDS.src1.extract(word),
    FIELDS.src2.extract(word),
    FIELDS.offset.extractSigned(word)
  );
}

/** Symbolic instruction fields, as written in assembly source */
export interface InstructionFields {
  opcode: string;
  predicate: string;
  target: string;
  src1: string;
  src2: string;
  offset: number;
}

export function instructionFromFields(fields: InstructionFields): Instruction {
  return new Instruction(
    lookupOpCode(fields.opcode),
    parseCondition(fields.predicate),
    lookupRegister(fields.target),
    lookupRegister(fields.src1),
    lookupRegister(fields.src2),
    fields.offset
  );
}
