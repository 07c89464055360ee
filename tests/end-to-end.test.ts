import { describe, it, expect } from 'vitest';
import { Assembler } from '../src/assembler/assembler.js';
import { formatObjectCode, parseObjectCode } from '../src/assembler/object-code.js';
import { Cpu } from '../src/emulator/cpu.js';
import { Memory, MemoryMappedIO, attachConsole } from '../src/emulator/memory.js';

function assembleClean(source: string): number[] {
  const result = new Assembler(source).assemble();
  expect(result.errors).toEqual([]);
  return result.words;
}

describe('assemble and run', () => {
  it('should halt after a single instruction', () => {
    const words = assembleClean('HALT ALWAYS r0,r0,r0[0]');
    expect(words).toEqual([0x03c00000]);

    const memory = new Memory();
    memory.load(words);
    const cpu = new Cpu(memory);
    let steps = 0;
    cpu.subscribe(() => steps++);
    cpu.run(0);

    expect(steps).toBe(1);
    for (let r = 0; r < 15; r++) {
      expect(cpu.getRegister(r)).toBe(0);
    }
    expect(cpu.getRegister(15)).toBe(1);
  });

  it('should sum a countdown through labels', () => {
    const source = [
      'start: LOAD r1,n # r1 = n',
      '       ADD r2,r0,r0',
      'loop:  ADD r2,r2,r1',
      '       SUB r1,r1,r0[1]',
      '       JUMP/P loop',
      '       STORE r2,total',
      '       HALT r0,r0,r0',
      'n:     DATA 4',
      'total: DATA 0',
    ].join('\n');

    const result = new Assembler(source).assemble();
    expect(result.errors).toEqual([]);
    expect(result.resolved[0]).toBe('start: LOAD/ALWAYS r1,r0,r15[7] # r1 = n');
    expect(result.resolved[4]).toBe('ADD/P r15,r0,r15[-2]');
    expect(result.resolved[5]).toBe('STORE/ALWAYS r2,r0,r15[3]');

    const memory = new Memory();
    memory.load(result.words);
    const cpu = new Cpu(memory);
    cpu.run(0);

    expect(memory.get(8)).toBe(10);
    expect(cpu.getRegister(1)).toBe(0);
    expect(cpu.getRegister(2)).toBe(10);
    expect(cpu.pc).toBe(7);
  });

  it('should survive a trip through object code', () => {
    const words = assembleClean('ADD r1,r0,r0[-7]\nSTORE r1,r0,r0[9]\nHALT r0,r0,r0');
    const loaded = parseObjectCode(formatObjectCode(words));
    expect(loaded).toEqual(words);

    const memory = new Memory(16);
    memory.load(loaded);
    new Cpu(memory).run(0);
    expect(memory.get(9)).toBe(0xfffffff9);
  });

  it('should count down on the console', () => {
    const words = assembleClean(
      [
        '      LOAD r1,r0,r0[510]',
        'loop: STORE r1,r0,r0[511]',
        '      SUB r1,r1,r0[1]',
        '      JUMP/P loop',
        '      HALT r0,r0,r0',
      ].join('\n')
    );

    const input = [3];
    const output: number[] = [];
    const memory = new MemoryMappedIO();
    attachConsole(memory, {
      input: () => input.shift(),
      output: (value) => output.push(value),
    });
    memory.load(words);
    new Cpu(memory).run(0);

    expect(output).toEqual([3, 2, 1]);
  });
});
