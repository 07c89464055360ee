import { describe, it, expect } from 'vitest';
import {
  CondFlag,
  DecodingError,
  Instruction,
  InstructionRangeError,
  LookupError,
  OpCode,
  decode,
  formatCondition,
  instructionFromFields,
  parseCondition,
} from '../../src/isa/instruction.js';
import { LineKind, parseLine } from '../../src/assembler/parser.js';

describe('Instruction', () => {
  describe('encode', () => {
    it('should pack every field', () => {
      const instr = new Instruction(OpCode.ADD, CondFlag.ALWAYS, 1, 2, 3, -14);
      // op=3<<26, cond=15<<22, target=1<<18, src1=2<<14, src2=3<<10, offset=0x3f2
      expect(instr.encode()).toBe(0x0fc48ff2);
    });

    it('should encode HALT ALWAYS r0,r0,r0[0]', () => {
      const instr = new Instruction(OpCode.HALT, CondFlag.ALWAYS, 0, 0, 0, 0);
      expect(instr.encode()).toBe(0x03c00000);
    });

    it('should never set the reserved bit', () => {
      const instr = new Instruction(OpCode.DIV, CondFlag.ALWAYS, 15, 15, 15, -1);
      expect(instr.encode()).toBe(0x1fffffff);
    });
  });

  describe('decode', () => {
    it('should unpack every field', () => {
      const instr = decode(0x0fc48ff2);
      expect(instr.op).toBe(OpCode.ADD);
      expect(instr.cond).toBe(CondFlag.ALWAYS);
      expect(instr.regTarget).toBe(1);
      expect(instr.regSrc1).toBe(2);
      expect(instr.regSrc2).toBe(3);
      expect(instr.offset).toBe(-14);
    });

    it('should round-trip well-formed instructions', () => {
      const samples = [
        new Instruction(OpCode.HALT, CondFlag.NEVER, 0, 0, 0, 0),
        new Instruction(OpCode.LOAD, CondFlag.M, 1, 0, 15, 511),
        new Instruction(OpCode.STORE, CondFlag.Z | CondFlag.P, 14, 13, 12, -512),
        new Instruction(OpCode.SUB, CondFlag.V, 7, 8, 9, -1),
        new Instruction(OpCode.MUL, CondFlag.ALWAYS, 15, 15, 15, 100),
        new Instruction(OpCode.DIV, CondFlag.M | CondFlag.V, 3, 2, 1, 0),
      ];
      for (const instr of samples) {
        expect(decode(instr.encode()).equals(instr)).toBe(true);
      }
    });

    it('should reject undefined opcodes', () => {
      expect(() => decode(4 << 26)).toThrow(DecodingError);
      expect(() => decode(4 << 26)).toThrow('Undefined opcode 4 in word 0x10000000');
      expect(() => decode(31 << 26)).toThrow(DecodingError);
    });

    it('should ignore the reserved bit', () => {
      expect(decode(0x83c00000).equals(decode(0x03c00000))).toBe(true);
    });
  });

  describe('construction', () => {
    it('should reject offsets outside the signed field range', () => {
      expect(() => new Instruction(OpCode.ADD, CondFlag.ALWAYS, 0, 0, 0, 512)).toThrow(
        InstructionRangeError
      );
      expect(() => new Instruction(OpCode.ADD, CondFlag.ALWAYS, 0, 0, 0, -513)).toThrow(
        'Offset -513 out of range [-512, 511]'
      );
    });

    it('should reject register indices outside 0..15', () => {
      expect(() => new Instruction(OpCode.ADD, CondFlag.ALWAYS, 16, 0, 0, 0)).toThrow(
        'Register index 16 out of range'
      );
      expect(() => new Instruction(OpCode.ADD, CondFlag.ALWAYS, 0, -1, 0, 0)).toThrow(
        InstructionRangeError
      );
    });

    it('should reject opcodes with no operation', () => {
      const unused: number = 4;
      const tooWide: number = 35;
      expect(() => new Instruction(unused, CondFlag.ALWAYS, 0, 0, 0, 0)).toThrow(InstructionRangeError);
      expect(() => new Instruction(tooWide, CondFlag.ALWAYS, 0, 0, 0, 0)).toThrow('Undefined opcode 35');
    });

    it('should compare field by field', () => {
      const a = new Instruction(OpCode.ADD, CondFlag.Z, 1, 2, 3, 4);
      expect(a.equals(new Instruction(OpCode.ADD, CondFlag.Z, 1, 2, 3, 4))).toBe(true);
      expect(a.equals(new Instruction(OpCode.ADD, CondFlag.Z, 1, 2, 3, 5))).toBe(false);
      expect(a.equals(new Instruction(OpCode.SUB, CondFlag.Z, 1, 2, 3, 4))).toBe(false);
    });
  });

  describe('toString', () => {
    it('should omit the condition when it is ALWAYS', () => {
      expect(String(new Instruction(OpCode.HALT, CondFlag.ALWAYS, 0, 0, 0, 0))).toBe(
        'HALT      r0,r0,r0[0]'
      );
    });

    it('should show other conditions after a slash', () => {
      expect(String(new Instruction(OpCode.ADD, CondFlag.Z, 1, 2, 3, -14))).toBe(
        'ADD/Z    r1,r2,r3[-14]'
      );
      expect(String(new Instruction(OpCode.SUB, CondFlag.M | CondFlag.Z, 15, 0, 15, 3))).toBe(
        'SUB/MZ   r15,r0,r15[3]'
      );
      expect(String(new Instruction(OpCode.LOAD, CondFlag.NEVER, 1, 0, 0, 0))).toBe(
        'LOAD/NEVER  r1,r0,r0[0]'
      );
    });

    it('should render text that assembles back to the same instruction', () => {
      const instr = new Instruction(OpCode.DIV, CondFlag.P | CondFlag.V, 4, 5, 6, -200);
      const line = parseLine(String(instr));
      expect(line.kind).toBe(LineKind.FULL);
      if (line.kind === LineKind.FULL) {
        expect(instructionFromFields(line).equals(instr)).toBe(true);
      }
    });
  });
});

describe('instructionFromFields', () => {
  it('should map names and aliases to codes', () => {
    const instr = instructionFromFields({
      opcode: 'add',
      predicate: 'np',
      target: 'pc',
      src1: 'zero',
      src2: 'r7',
      offset: 3,
    });
    expect(instr.equals(new Instruction(OpCode.ADD, CondFlag.M | CondFlag.P, 15, 0, 7, 3))).toBe(
      true
    );
  });

  it('should fail with a lookup error on unknown names', () => {
    const fields = { opcode: 'ADD', predicate: 'ALWAYS', target: 'r1', src1: 'r2', src2: 'r3', offset: 0 };
    expect(() => instructionFromFields({ ...fields, opcode: 'JUMP' })).toThrow(LookupError);
    expect(() => instructionFromFields({ ...fields, opcode: 'JUMP' })).toThrow("Unknown opcode 'JUMP'");
    expect(() => instructionFromFields({ ...fields, target: 'r16' })).toThrow("Unknown register 'r16'");
    expect(() => instructionFromFields({ ...fields, predicate: 'Q' })).toThrow("Unknown predicate 'Q'");
  });
});

describe('conditions', () => {
  it('should parse named and lettered predicates', () => {
    expect(parseCondition('ALWAYS')).toBe(CondFlag.ALWAYS);
    expect(parseCondition('never')).toBe(CondFlag.NEVER);
    expect(parseCondition('NZP')).toBe(7);
    expect(parseCondition('M')).toBe(CondFlag.M);
    expect(parseCondition('V')).toBe(CondFlag.V);
  });

  it('should format exact names before letter combinations', () => {
    expect(formatCondition(CondFlag.ALWAYS)).toBe('ALWAYS');
    expect(formatCondition(CondFlag.NEVER)).toBe('NEVER');
    expect(formatCondition(CondFlag.Z | CondFlag.P)).toBe('ZP');
    expect(formatCondition(CondFlag.M | CondFlag.V)).toBe('MV');
  });
});
