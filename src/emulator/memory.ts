/**
 * Word Memory
 *
 * A flat, word-addressed store. Each cell holds one unsigned 32-bit word:
 * an encoded instruction or a data value.
 *
 * MemoryMappedIO routes selected addresses to device handlers. By default
 * the console lives at:
 * - 510: read an integer from the input source
 * - 511: write an integer to the output sink
 */

export const DEFAULT_MEMORY_SIZE = 512;
export const IO_READ_ADDRESS = 510;
export const IO_WRITE_ADDRESS = 511;

/** What the CPU needs from a memory */
export interface WordMemory {
  get(address: number): number;
  put(address: number, value: number): void;
}

export class MemoryBoundsError extends Error {
  constructor(public address: number, public size: number) {
    super(`Address ${address} out of range [0, ${size})`);
    this.name = 'MemoryBoundsError';
  }
}

export class InputExhaustedError extends Error {
  constructor(public address: number) {
    super(`No input left for read at address ${address}`);
    this.name = 'InputExhaustedError';
  }
}

export class Memory implements WordMemory {
  protected cells: Uint32Array;

  constructor(size: number = DEFAULT_MEMORY_SIZE) {
    this.cells = new Uint32Array(size);
  }

  get size(): number {
    return this.cells.length;
  }

  get(address: number): number {
    this.checkAddress(address);
    return this.cells[address];
  }

  put(address: number, value: number): void {
    this.checkAddress(address);
    this.cells[address] = value >>> 0;
  }

  /**
   * Copy a program image into memory starting at `base`
   */
  load(words: readonly number[], base: number = 0): void {
    if (words.length > 0) {
      this.checkAddress(base);
      this.checkAddress(base + words.length - 1);
    }
    words.forEach((word, i) => {
      this.cells[base + i] = word >>> 0;
    });
  }

  protected checkAddress(address: number): void {
    if (!Number.isInteger(address) || address < 0 || address >= this.cells.length) {
      throw new MemoryBoundsError(address, this.cells.length);
    }
  }
}

export interface MmioHandlers {
  read?: (address: number) => number;
  write?: (address: number, value: number) => void;
}

export class MemoryMappedIO extends Memory {
  private devices: Map<number, MmioHandlers> = new Map();

  /**
   * Route reads and/or writes of `address` to a device. A direction with no
   * handler falls through to the memory cell.
   */
  map(address: number, handlers: MmioHandlers): void {
    this.checkAddress(address);
    this.devices.set(address, handlers);
  }

  override get(address: number): number {
    const read = this.devices.get(address)?.read;
    if (read) {
      return read(address) >>> 0;
    }
    return super.get(address);
  }

  override put(address: number, value: number): void {
    const write = this.devices.get(address)?.write;
    if (write) {
      write(address, value | 0);
      return;
    }
    super.put(address, value);
  }
}

export interface ConsoleIO {
  /** Next input value, or undefined when input is exhausted */
  input: () => number | undefined;
  output: (value: number) => void;
}

/**
 * Map the console device onto its read and write addresses
 */
export function attachConsole(
  memory: MemoryMappedIO,
  io: ConsoleIO,
  readAddress: number = IO_READ_ADDRESS,
  writeAddress: number = IO_WRITE_ADDRESS
): void {
  memory.map(readAddress, {
    read: (address) => {
      const value = io.input();
      if (value === undefined) {
        throw new InputExhaustedError(address);
      }
      return value;
    },
  });
  memory.map(writeAddress, {
    write: (_address, value) => io.output(value),
  });
}
