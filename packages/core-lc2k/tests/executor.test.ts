import { describe, expect, it } from 'vitest';

import { encode } from '@lc2k/assembler-lc2k';

import { decode, disassemble, MachineState, signExtend16, step } from '../src/index.js';

function machine(registers: number[], pc = 0, program: number[] = []): MachineState {
  const state = new MachineState(program);
  state.loadState({ registers: [0, ...registers], pc });
  return state;
}

describe('decode', () => {
  it('inverts the assembler encoding', () => {
    expect(decode(encode('add', 5, 6, 7))).toMatchObject({ opcode: 'add', regA: 5, regB: 6, destReg: 7 });
    expect(decode(encode('nand', 1, 0, 4))).toMatchObject({ opcode: 'nand', regA: 1, regB: 0, destReg: 4 });
    expect(decode(encode('lw', 3, 4, -7))).toMatchObject({ opcode: 'lw', regA: 3, regB: 4, offset: -7 });
    expect(decode(encode('sw', 2, 1, 32767))).toMatchObject({ opcode: 'sw', regA: 2, regB: 1, offset: 32767 });
    expect(decode(encode('beq', 0, 7, -32768))).toMatchObject({ opcode: 'beq', regA: 0, regB: 7, offset: -32768 });
    expect(decode(encode('jalr', 6, 2))).toMatchObject({ opcode: 'jalr', regA: 6, regB: 2 });
    expect(decode(encode('halt'))?.opcode).toBe('halt');
    expect(decode(encode('noop'))?.opcode).toBe('noop');
  });

  it('has no opcode for words with the upper bits set', () => {
    expect(decode(-1)).toBeUndefined();
    expect(decode(1 << 25)).toBeUndefined();
  });

  it('sign-extends 16-bit offsets', () => {
    expect(signExtend16(0xffff)).toBe(-1);
    expect(signExtend16(0x7fff)).toBe(32767);
    expect(signExtend16(0x8000)).toBe(-32768);
    expect(signExtend16(0x12345)).toBe(0x2345);
  });
});

describe('step', () => {
  it('adds with 32-bit wraparound and advances the PC', () => {
    const state = machine([3, 4]);
    expect(step(encode('add', 1, 2, 3), state)).toEqual({ status: 'continue' });
    expect(state.read(3)).toBe(7);
    expect(state.pc).toBe(1);

    const overflow = machine([2147483647, 1]);
    step(encode('add', 1, 2, 3), overflow);
    expect(overflow.read(3)).toBe(-2147483648);
  });

  it('discards writes to register 0', () => {
    const state = machine([3, 4]);
    step(encode('add', 1, 2, 0), state);
    expect(state.read(0)).toBe(0);
    expect(state.pc).toBe(1);
  });

  it('computes bitwise nand', () => {
    const state = machine([12, 10]);
    step(encode('nand', 1, 2, 3), state);
    expect(state.read(3)).toBe(-9);
  });

  it('loads and stores through register + offset', () => {
    const state = machine([4, 0], 0, [0, 0, 0, 99]);
    step(encode('lw', 1, 2, -1), state);
    expect(state.read(2)).toBe(99);
    expect(state.pc).toBe(1);

    const store = machine([10, -5]);
    step(encode('sw', 1, 2, 5), store);
    expect(store.load(15)).toBe(-5);
    expect(store.pc).toBe(1);
  });

  it('faults on out-of-range data addresses without moving the PC', () => {
    const load = machine([0], 4);
    expect(step(encode('lw', 1, 2, -1), load)).toEqual({
      status: 'fault',
      fault: { code: 'MEMORY_ADDRESS_OUT_OF_BOUNDS', pc: 4, message: 'Memory address out of bounds: -1' }
    });
    expect(load.pc).toBe(4);

    const store = machine([65535, 1]);
    const result = step(encode('sw', 1, 2, 1), store);
    expect(result.status).toBe('fault');
    expect(store.pc).toBe(0);
  });

  it('branches to PC + 1 + offset only when the registers are equal', () => {
    const taken = machine([0, 0], 3);
    step(encode('beq', 1, 2, 2), taken);
    expect(taken.pc).toBe(6);

    const notTaken = machine([1, 0], 3);
    step(encode('beq', 1, 2, 2), notTaken);
    expect(notTaken.pc).toBe(4);
  });

  it('faults when a taken branch leaves memory', () => {
    const state = machine([]);
    expect(step(encode('beq', 0, 0, -5), state)).toEqual({
      status: 'fault',
      fault: { code: 'PC_OUT_OF_BOUNDS', pc: 0, message: 'Jump target out of bounds: -4' }
    });
    expect(state.pc).toBe(0);
  });

  it('links PC + 1 and jumps to the original regA value', () => {
    const state = machine([10], 5);
    step(encode('jalr', 1, 2), state);
    expect(state.read(2)).toBe(6);
    expect(state.pc).toBe(10);

    const same = machine([10], 5);
    step(encode('jalr', 1, 1), same);
    expect(same.read(1)).toBe(6);
    expect(same.pc).toBe(10);
  });

  it('faults at the jalr itself and skips the link write when the target is outside memory', () => {
    const state = machine([-1, 77], 2);
    const result = step(encode('jalr', 1, 2), state);
    expect(result).toEqual({
      status: 'fault',
      fault: { code: 'PC_OUT_OF_BOUNDS', pc: 2, message: 'Jump target out of bounds: -1' }
    });
    expect(state.read(2)).toBe(77);
    expect(state.pc).toBe(2);
  });

  it('halts after advancing the PC and treats noop as a plain advance', () => {
    const state = machine([], 2);
    expect(step(encode('halt'), state)).toEqual({ status: 'halted' });
    expect(state.pc).toBe(3);

    expect(step(encode('noop'), state)).toEqual({ status: 'continue' });
    expect(state.pc).toBe(4);
  });

  it('faults on words without an opcode', () => {
    const state = machine([], 1);
    expect(step(-1, state)).toEqual({
      status: 'fault',
      fault: { code: 'UNKNOWN_OPCODE', pc: 1, message: 'Unknown opcode in word -1' }
    });
    expect(state.pc).toBe(1);
  });
});

describe('disassemble', () => {
  it('renders instructions in assembler syntax', () => {
    expect(disassemble(655361)).toBe('add 1 2 1');
    expect(disassemble(8454150)).toBe('lw 0 1 6');
    expect(disassemble(16842749)).toBe('beq 0 0 -3');
    expect(disassemble(23396352)).toBe('jalr 4 5');
    expect(disassemble(25165824)).toBe('halt');
  });

  it('falls back to .fill for undecodable words', () => {
    expect(disassemble(-1)).toBe('.fill -1');
  });
});
