import { OperandRangeError } from './errors.js';
import { LC2K_MNEMONICS, type Mnemonic } from './types.js';

const OPCODE_SHIFT = 22;
const REG_A_SHIFT = 19;
const REG_B_SHIFT = 16;

export const REGISTER_MAX = 7;
export const OFFSET_MIN = -0x8000;
export const OFFSET_MAX = 0x7fff;

const MNEMONIC_SET: ReadonlySet<string> = new Set(LC2K_MNEMONICS);

export function isMnemonic(token: string): token is Mnemonic {
  return MNEMONIC_SET.has(token);
}

export function opcodeOf(mnemonic: Mnemonic): number {
  return LC2K_MNEMONICS.indexOf(mnemonic);
}

function toRegister(value: number, field: string): number {
  if (!Number.isInteger(value) || value < 0 || value > REGISTER_MAX) {
    throw new OperandRangeError(`${field} out of range 0..${REGISTER_MAX}: ${value}`);
  }
  return value;
}

function toOffset16(value: number): number {
  if (!Number.isInteger(value) || value < OFFSET_MIN || value > OFFSET_MAX) {
    throw new OperandRangeError(`offset out of 16-bit range: ${value}`);
  }
  return value & 0xffff;
}

// destOrOffset は add/nand では destReg、lw/sw/beq では符号付き 16bit offset。
export function encode(mnemonic: Mnemonic, regA = 0, regB = 0, destOrOffset = 0): number {
  const opcode = opcodeOf(mnemonic) << OPCODE_SHIFT;
  switch (mnemonic) {
    case 'add':
    case 'nand':
      return (
        opcode |
        (toRegister(regA, 'regA') << REG_A_SHIFT) |
        (toRegister(regB, 'regB') << REG_B_SHIFT) |
        toRegister(destOrOffset, 'destReg')
      );
    case 'lw':
    case 'sw':
    case 'beq':
      return (
        opcode |
        (toRegister(regA, 'regA') << REG_A_SHIFT) |
        (toRegister(regB, 'regB') << REG_B_SHIFT) |
        toOffset16(destOrOffset)
      );
    case 'jalr':
      return opcode | (toRegister(regA, 'regA') << REG_A_SHIFT) | (toRegister(regB, 'regB') << REG_B_SHIFT);
    case 'halt':
    case 'noop':
      return opcode;
  }
}
