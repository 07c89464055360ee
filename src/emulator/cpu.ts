/**
 * CPU
 *
 * 16 registers (r0 hardwired to 0, r15 is the program counter), a condition
 * register holding the flags of the last executed instruction, and a
 * connection to a word memory.
 *
 * Every instruction is predicated: it runs only if its condition mask shares
 * a bit with the condition register. There is no branch instruction; a jump
 * is an ordinary ALU result written to r15.
 */

import {
  CondFlag,
  OpCode,
  PC_REGISTER,
  REGISTER_COUNT,
  decode,
} from '../isa/instruction.js';
import type { Instruction } from '../isa/instruction.js';
import { Alu } from './alu.js';
import { Register, ZeroRegister } from './register.js';
import type { WordMemory } from './memory.js';

/** Reported to listeners before each instruction executes */
export interface CpuStep {
  pcAddress: number;
  word: number;
  instruction: Instruction;
}

export type CpuListener = (step: CpuStep) => void;

export interface CpuOptions {
  // Log every step through `log`
  verbose: boolean;
  log: (message: string) => void;
}

const DEFAULT_OPTIONS: CpuOptions = {
  verbose: false,
  log: (message) => console.log(message),
};

export class Cpu {
  readonly registers: ReadonlyArray<Register>;
  condition: CondFlag = CondFlag.ALWAYS;
  halted: boolean = false;

  private readonly alu = new Alu();
  private readonly listeners: Set<CpuListener> = new Set();
  private readonly options: CpuOptions;

  constructor(
    readonly memory: WordMemory,
    options: Partial<CpuOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    const registers: Register[] = [new ZeroRegister()];
    for (let i = 1; i < REGISTER_COUNT; i++) {
      registers.push(new Register());
    }
    this.registers = registers;
  }

  get pc(): number {
    return this.registers[PC_REGISTER].get();
  }

  set pc(address: number) {
    this.registers[PC_REGISTER].put(address);
  }

  getRegister(index: number): number {
    const reg = this.registers[index];
    if (!reg) {
      throw new RangeError(`No register r${index}`);
    }
    return reg.get();
  }

  /**
   * Zero all registers and clear the halted flag
   */
  reset(): void {
    for (const reg of this.registers) {
      reg.put(0);
    }
    this.condition = CondFlag.ALWAYS;
    this.halted = false;
  }

  /**
   * Register a step listener. Returns a function that removes it.
   */
  subscribe(listener: CpuListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * One fetch/decode/execute cycle
   */
  step(): void {
    const pcAddress = this.pc;
    const word = this.memory.get(pcAddress);
    const instruction = decode(word);

    this.notify({ pcAddress, word, instruction });

    if ((this.condition & instruction.cond) === CondFlag.NEVER) {
      this.pc = pcAddress + 1;
      return;
    }

    const left = this.registers[instruction.regSrc1].get();
    const right = this.registers[instruction.regSrc2].get() + instruction.offset;

    // Incremented before the result is stored, so an instruction that
    // targets r15 decides the next address
    this.pc = pcAddress + 1;

    const { value, flags } = this.alu.execute(instruction.op, left, right);
    this.condition = flags;

    const target = this.registers[instruction.regTarget];
    switch (instruction.op) {
      case OpCode.HALT:
        this.halted = true;
        break;
      case OpCode.LOAD:
        target.put(this.memory.get(value));
        break;
      case OpCode.STORE:
        this.memory.put(value, target.get());
        break;
      default:
        target.put(value);
    }
  }

  /**
   * Run from `startAddress` until a HALT executes
   */
  run(startAddress: number): void {
    this.pc = startAddress;
    this.halted = false;
    while (!this.halted) {
      this.step();
    }
  }

  /**
   * Run from `startAddress`, waiting for `resume` after every step that
   * leaves the machine running
   */
  async runStepwise(startAddress: number, resume: () => Promise<void>): Promise<void> {
    this.pc = startAddress;
    this.halted = false;
    while (!this.halted) {
      this.step();
      if (!this.halted) {
        await resume();
      }
    }
  }

  private notify(step: CpuStep): void {
    if (this.options.verbose) {
      const address = step.pcAddress.toString(16).padStart(4, '0');
      this.options.log(`${address}: ${step.instruction}`);
    }
    for (const listener of this.listeners) {
      listener(step);
    }
  }
}
