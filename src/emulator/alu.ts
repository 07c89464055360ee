/**
 * Arithmetic Logic Unit
 *
 * Computes a 32-bit signed result and the condition flags that describe it.
 */

import { CondFlag, OpCode } from '../isa/instruction.js';

export interface AluResult {
  value: number;
  flags: CondFlag;
}

const INT32_MIN = -0x80000000;
const INT32_MAX = 0x7fffffff;

/**
 * Flags for a result: exactly one of M, Z, P
 */
export function flagsFor(value: number): CondFlag {
  if (value < 0) return CondFlag.M;
  if (value === 0) return CondFlag.Z;
  return CondFlag.P;
}

export class Alu {
  /**
   * HALT, LOAD and STORE compute an address, so they add like ADD.
   * Division by zero yields 0 with the V flag set instead of throwing.
   */
  execute(op: OpCode, a: number, b: number): AluResult {
    let exact: number;
    let wrapped: number;

    switch (op) {
      case OpCode.HALT:
      case OpCode.LOAD:
      case OpCode.STORE:
      case OpCode.ADD:
        exact = a + b;
        wrapped = exact | 0;
        break;
      case OpCode.SUB:
        exact = a - b;
        wrapped = exact | 0;
        break;
      case OpCode.MUL:
        exact = a * b;
        wrapped = Math.imul(a, b);
        break;
      case OpCode.DIV:
        if (b === 0) {
          return { value: 0, flags: CondFlag.Z | CondFlag.V };
        }
        exact = Math.trunc(a / b);
        wrapped = exact | 0;
        break;
      default:
        throw new Error(`ALU has no operation for opcode ${op}`);
    }

    const overflow = exact < INT32_MIN || exact > INT32_MAX;
    return {
      value: wrapped,
      flags: overflow ? flagsFor(wrapped) | CondFlag.V : flagsFor(wrapped),
    };
  }
}
