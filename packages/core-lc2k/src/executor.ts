import { MachineFault } from './errors.js';
import type { MachineState } from './machine-state.js';
import { LC2K_OPCODES, type DecodedInstruction, type FaultInfo, type StepResult } from './types.js';

const CONTINUE: StepResult = { status: 'continue' };
const HALTED: StepResult = { status: 'halted' };

export function signExtend16(value: number): number {
  const low = value & 0xffff;
  return (low & 0x8000) !== 0 ? low - 0x10000 : low;
}

// bit 31..25 が立っているワードは命令として扱わない。
export function decode(word: number): DecodedInstruction | undefined {
  if (word >>> 25 !== 0) {
    return undefined;
  }
  const opcode = LC2K_OPCODES[(word >>> 22) & 0b111];
  if (opcode === undefined) {
    return undefined;
  }
  return {
    opcode,
    regA: (word >>> 19) & 0b111,
    regB: (word >>> 16) & 0b111,
    destReg: word & 0b111,
    offset: signExtend16(word)
  };
}

function fault(info: FaultInfo): StepResult {
  return { status: 'fault', fault: info };
}

function jumpOutOfBounds(pc: number, target: number): StepResult {
  return fault({ code: 'PC_OUT_OF_BOUNDS', pc, message: `Jump target out of bounds: ${target}` });
}

function execute(instruction: DecodedInstruction, state: MachineState): StepResult {
  const { opcode, regA, regB, destReg, offset } = instruction;
  const nextPc = state.pc + 1;

  switch (opcode) {
    case 'add':
      state.write(destReg, (state.read(regA) + state.read(regB)) | 0);
      break;
    case 'nand':
      state.write(destReg, ~(state.read(regA) & state.read(regB)));
      break;
    case 'lw':
      state.write(regB, state.load(state.read(regA) + offset));
      break;
    case 'sw':
      state.store(state.read(regA) + offset, state.read(regB));
      break;
    case 'beq':
      if (state.read(regA) === state.read(regB)) {
        const target = nextPc + offset;
        if (!state.isAddressInBounds(target)) {
          return jumpOutOfBounds(state.pc, target);
        }
        state.pc = target;
        return CONTINUE;
      }
      break;
    case 'jalr': {
      // regA と regB が同じでも、リンク書き込み前の値へ飛ぶ。
      const target = state.read(regA);
      if (!state.isAddressInBounds(target)) {
        return jumpOutOfBounds(state.pc, target);
      }
      state.write(regB, nextPc);
      state.pc = target;
      return CONTINUE;
    }
    case 'halt':
      state.pc = nextPc;
      return HALTED;
    case 'noop':
      break;
  }

  state.pc = nextPc;
  return CONTINUE;
}

// フォルトした命令は PC を含め状態を変更しない。
export function step(word: number, state: MachineState): StepResult {
  const instruction = decode(word);
  if (!instruction) {
    return fault({ code: 'UNKNOWN_OPCODE', pc: state.pc, message: `Unknown opcode in word ${word}` });
  }
  try {
    return execute(instruction, state);
  } catch (error) {
    if (error instanceof MachineFault) {
      return fault(error.toFaultInfo());
    }
    throw error;
  }
}
