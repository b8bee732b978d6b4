export const LC2K_OPCODES = ['add', 'nand', 'lw', 'sw', 'beq', 'jalr', 'halt', 'noop'] as const;

export type Opcode = (typeof LC2K_OPCODES)[number];

// デコード済み命令。offset は 16bit から符号拡張済み。
export interface DecodedInstruction {
  opcode: Opcode;
  regA: number;
  regB: number;
  destReg: number;
  offset: number;
}

// 保存/復元可能なマシン状態スナップショット (メモリを除く)。
export interface MachineSnapshot {
  registers: number[];
  pc: number;
}

export interface MemoryWord {
  address: number;
  value: number;
}

export type FaultCode = 'PC_OUT_OF_BOUNDS' | 'MEMORY_ADDRESS_OUT_OF_BOUNDS' | 'UNKNOWN_OPCODE' | 'STEP_LIMIT_EXCEEDED';

export interface FaultInfo {
  code: FaultCode;
  pc: number;
  message: string;
}

export type StepResult = { status: 'continue' } | { status: 'halted' } | { status: 'fault'; fault: FaultInfo };

export type SimulatorStatus = 'running' | 'halted' | 'faulted';

// 1 命令実行前の状態。
export interface ExecutionLogEntry {
  step: number;
  pc: number;
  registers: number[];
  instruction: string;
}

export interface SimulationReport {
  registers: number[];
  pc: number;
  instructionsExecuted: number;
  memory: MemoryWord[];
}

export interface SimulationResult {
  status: Exclude<SimulatorStatus, 'running'>;
  report: SimulationReport;
  log: ExecutionLogEntry[];
  fault?: FaultInfo;
}

export interface SimulatorOptions {
  maxSteps?: number;
  recordLog?: boolean;
  onStep?: (entry: ExecutionLogEntry) => void;
  onFault?: (fault: FaultInfo) => void;
}
