/**
 * Registers
 *
 * A register is a single 32-bit signed integer cell. Register 0 is wired to
 * zero: writes are discarded and reads return 0.
 */

export class Register {
  private value: number = 0;

  get(): number {
    return this.value;
  }

  put(value: number): void {
    this.value = value | 0;
  }
}

export class ZeroRegister extends Register {
  override get(): number {
    return 0;
  }

  override put(_value: number): void {
    // Hard-wired to zero
  }
}
