/**
 * Bit Fields
 *
 * Extract and insert fixed bit ranges of a 32-bit word.
 */

export class BitField {
  readonly lo: number;
  readonly hi: number;
  readonly width: number;
  private readonly mask: number;

  /**
   * @param lo - lowest bit of the field (0 = least significant)
   * @param hi - highest bit of the field, inclusive
   */
  constructor(lo: number, hi: number) {
    if (!Number.isInteger(lo) || !Number.isInteger(hi) || lo < 0 || hi > 31 || lo > hi) {
      throw new RangeError(`Invalid bit field [${lo}, ${hi}]`);
    }
    this.lo = lo;
    this.hi = hi;
    this.width = hi - lo + 1;
    // (1 << 32) wraps, so the full-width mask is spelled out
    this.mask = this.width === 32 ? 0xffffffff : ((1 << this.width) >>> 0) - 1;
  }

  /**
   * Unsigned value of the field
   */
  extract(word: number): number {
    return ((word >>> this.lo) & this.mask) >>> 0;
  }

  /**
   * Field value sign-extended from its top bit
   */
  extractSigned(word: number): number {
    const shift = 32 - this.width;
    return (this.extract(word) << shift) >> shift;
  }

  /**
   * Replace the field in `word` with `value`, truncated to the field width.
   * Bits outside the field are left as they were.
   */
  insert(value: number, word: number): number {
    const cleared = word & ~(this.mask << this.lo);
    return (cleared | ((value & this.mask) << this.lo)) >>> 0;
  }

  /** Smallest value the field holds when read as signed */
  get minSigned(): number {
    return -(2 ** (this.width - 1));
  }

  /** Largest value the field holds when read as signed */
  get maxSigned(): number {
    return 2 ** (this.width - 1) - 1;
  }

  /** Largest value the field holds when read as unsigned */
  get maxUnsigned(): number {
    return this.mask;
  }

  /** True if the field shares a bit with `other` */
  overlaps(other: BitField): boolean {
    return this.lo <= other.hi && other.lo <= this.hi;
  }
}
