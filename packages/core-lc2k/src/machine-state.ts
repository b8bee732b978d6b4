import { MachineFault, SimulatorError } from './errors.js';
import type { MachineSnapshot, MemoryWord } from './types.js';

export const REGISTER_COUNT = 8;
export const MEMORY_SIZE = 0x10000;

function checkRegister(reg: number): number {
  if (!Number.isInteger(reg) || reg < 0 || reg >= REGISTER_COUNT) {
    throw new RangeError(`Register index out of range 0..${REGISTER_COUNT - 1}: ${reg}`);
  }
  return reg;
}

// レジスタ・メモリ・PC。値はすべて符号付き 32bit、r0 への書き込みは捨てる。
export class MachineState {
  private readonly registers = new Int32Array(REGISTER_COUNT);

  private readonly memory = new Int32Array(MEMORY_SIZE);

  pc = 0;

  constructor(program: readonly number[] = []) {
    this.loadProgram(program);
  }

  // プログラムをアドレス 0 から配置し、レジスタと PC を初期化する。
  loadProgram(words: readonly number[]): void {
    if (words.length > MEMORY_SIZE) {
      throw new SimulatorError('PROGRAM_TOO_LARGE', `Program too big: ${words.length} > ${MEMORY_SIZE}`);
    }
    this.memory.fill(0);
    this.memory.set(words);
    this.registers.fill(0);
    this.pc = 0;
  }

  read(reg: number): number {
    return this.registers[checkRegister(reg)] ?? 0;
  }

  write(reg: number, value: number): void {
    if (checkRegister(reg) === 0) {
      return;
    }
    this.registers[reg] = value;
  }

  isAddressInBounds(address: number): boolean {
    return Number.isInteger(address) && address >= 0 && address < MEMORY_SIZE;
  }

  load(address: number): number {
    this.checkAddress(address);
    return this.memory[address] ?? 0;
  }

  store(address: number, value: number): void {
    this.checkAddress(address);
    this.memory[address] = value;
  }

  getState(): MachineSnapshot {
    return {
      registers: Array.from(this.registers),
      pc: this.pc
    };
  }

  loadState(state: MachineSnapshot): void {
    for (let reg = 1; reg < REGISTER_COUNT; reg += 1) {
      this.registers[reg] = state.registers[reg] ?? 0;
    }
    this.registers[0] = 0;
    this.pc = state.pc;
  }

  nonZeroMemory(): MemoryWord[] {
    const words: MemoryWord[] = [];
    this.memory.forEach((value, address) => {
      if (value !== 0) {
        words.push({ address, value });
      }
    });
    return words;
  }

  private checkAddress(address: number): void {
    if (!this.isAddressInBounds(address)) {
      throw new MachineFault('MEMORY_ADDRESS_OUT_OF_BOUNDS', this.pc, `Memory address out of bounds: ${address}`);
    }
  }
}
