import { describe, it, expect } from 'vitest';
import { BitField } from '../../src/isa/bitfield.js';
import { FIELDS } from '../../src/isa/instruction.js';

describe('BitField', () => {
  describe('construction', () => {
    it('should compute the width', () => {
      expect(new BitField(0, 9).width).toBe(10);
      expect(new BitField(31, 31).width).toBe(1);
      expect(new BitField(0, 31).width).toBe(32);
    });

    it('should reject inverted or out-of-word ranges', () => {
      expect(() => new BitField(5, 3)).toThrow(RangeError);
      expect(() => new BitField(0, 32)).toThrow(RangeError);
      expect(() => new BitField(-1, 4)).toThrow(RangeError);
    });
  });

  describe('extract', () => {
    it('should shift and mask', () => {
      const field = new BitField(4, 7);
      expect(field.extract(0x000000a0)).toBe(0xa);
      expect(field.extract(0xffffffff)).toBe(0xf);
    });

    it('should read the top bit as unsigned', () => {
      expect(new BitField(31, 31).extract(0x80000000)).toBe(1);
      expect(new BitField(0, 31).extract(0xffffffff)).toBe(0xffffffff);
    });
  });

  describe('extractSigned', () => {
    const field = new BitField(0, 9);

    it('should sign-extend from the top bit of the field', () => {
      expect(field.extractSigned(0x3ff)).toBe(-1);
      expect(field.extractSigned(0x200)).toBe(-512);
      expect(field.extractSigned(0x1ff)).toBe(511);
      expect(field.extractSigned(0)).toBe(0);
    });

    it('should ignore bits outside the field', () => {
      expect(field.extractSigned(0xfffffc05)).toBe(5);
    });

    it('should handle a full-width field', () => {
      expect(new BitField(0, 31).extractSigned(0xffffffff)).toBe(-1);
    });
  });

  describe('insert', () => {
    it('should place the value and return an unsigned word', () => {
      expect(new BitField(0, 9).insert(5, 0)).toBe(5);
      expect(new BitField(31, 31).insert(1, 0)).toBe(0x80000000);
    });

    it('should store negative values in two\'s complement', () => {
      const field = new BitField(0, 9);
      const word = field.insert(-14, 0);
      expect(word).toBe(0x3f2);
      expect(field.extractSigned(word)).toBe(-14);
    });

    it('should not touch bits outside the field', () => {
      const field = new BitField(4, 7);
      expect(field.insert(0, 0xffffffff)).toBe(0xffffff0f);
      expect(field.insert(0xf, 0)).toBe(0x000000f0);
    });

    it('should truncate values wider than the field', () => {
      const field = new BitField(4, 7);
      const word = field.insert(0x1a5, 0xffffffff);
      expect(word).toBe(0xffffff5f);
      expect(field.extract(word)).toBe(0x1a5 % 16);
    });

    it('should replace previous field contents', () => {
      const field = new BitField(8, 15);
      for (const prior of [0, 0xffffffff, 0x12345678]) {
        for (const value of [0, 1, 0x7f, 0xff, 0x100, 0x3c9]) {
          const word = field.insert(value, prior);
          expect(field.extract(word)).toBe(value % 256);
          expect(word & 0xffff00ff).toBe(prior & 0xffff00ff);
        }
      }
    });
  });

  describe('signed range', () => {
    it('should report the representable range', () => {
      const field = new BitField(0, 9);
      expect(field.minSigned).toBe(-512);
      expect(field.maxSigned).toBe(511);
      expect(field.maxUnsigned).toBe(1023);
    });
  });
});

describe('instruction layout', () => {
  const fields = Object.values(FIELDS);

  it('should not overlap', () => {
    for (let i = 0; i < fields.length; i++) {
      for (let j = i + 1; j < fields.length; j++) {
        expect(fields[i].overlaps(fields[j])).toBe(false);
      }
    }
  });

  it('should cover the whole word', () => {
    const total = fields.reduce((sum, field) => sum + field.width, 0);
    expect(total).toBe(32);
    expect(FIELDS.reserved.lo).toBe(31);
    expect(FIELDS.offset.lo).toBe(0);
  });
});
