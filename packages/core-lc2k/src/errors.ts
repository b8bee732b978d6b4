import type { FaultCode, FaultInfo } from './types.js';

// シミュレータ側のエラーコード定義。
export type SimulatorErrorCode = FaultCode | 'PROGRAM_TOO_LARGE' | 'INVALID_MACHINE_CODE';

export type NumericErrorCode = `S${string}`;

export interface ErrorCatalogEntry {
  code?: SimulatorErrorCode;
  numericCode: NumericErrorCode;
  message: string;
}

export const ERROR_CATALOG: readonly ErrorCatalogEntry[] = [
  { code: 'PC_OUT_OF_BOUNDS', numericCode: 'S01', message: 'PC OUT OF BOUNDS' },
  { code: 'MEMORY_ADDRESS_OUT_OF_BOUNDS', numericCode: 'S02', message: 'MEMORY ADDRESS OUT OF BOUNDS' },
  { code: 'UNKNOWN_OPCODE', numericCode: 'S03', message: 'UNKNOWN OPCODE' },
  { code: 'STEP_LIMIT_EXCEEDED', numericCode: 'S04', message: 'STEP LIMIT EXCEEDED' },
  { code: 'PROGRAM_TOO_LARGE', numericCode: 'S05', message: 'PROGRAM TOO LARGE' },
  { code: 'INVALID_MACHINE_CODE', numericCode: 'S06', message: 'INVALID MACHINE CODE' },
  { numericCode: 'S99', message: 'UNKNOWN' }
];

const UNKNOWN_ENTRY: ErrorCatalogEntry = ERROR_CATALOG.find((entry) => entry.numericCode === 'S99') ?? {
  numericCode: 'S99',
  message: 'UNKNOWN'
};

const BY_CODE = new Map<SimulatorErrorCode, ErrorCatalogEntry>();
for (const entry of ERROR_CATALOG) {
  if (entry.code !== undefined) {
    BY_CODE.set(entry.code, entry);
  }
}

export function getErrorCatalogEntry(code: SimulatorErrorCode): ErrorCatalogEntry {
  return BY_CODE.get(code) ?? UNKNOWN_ENTRY;
}

export class SimulatorError<C extends SimulatorErrorCode = SimulatorErrorCode> extends Error {
  readonly code: C;

  constructor(code: C, detail?: string) {
    super(detail ?? getErrorCatalogEntry(code).message);
    this.name = 'SimulatorError';
    this.code = code;
  }

  getNumericCode(): NumericErrorCode {
    return getErrorCatalogEntry(this.code).numericCode;
  }

  toDisplayString(): string {
    return `${this.message} (${this.getNumericCode()})`;
  }
}

// 実行中に発生した致命的な例外。発生時の PC を保持する。
export class MachineFault extends SimulatorError<FaultCode> {
  readonly pc: number;

  constructor(code: FaultCode, pc: number, detail?: string) {
    super(code, detail);
    this.name = 'MachineFault';
    this.pc = pc;
  }

  toFaultInfo(): FaultInfo {
    return { code: this.code, pc: this.pc, message: this.message };
  }
}

export function asDisplayError(error: unknown): string {
  if (error instanceof SimulatorError) {
    return error.toDisplayString();
  }
  if (error instanceof Error && error.message.length > 0) {
    return `${error.message} (${UNKNOWN_ENTRY.numericCode})`;
  }
  return `${UNKNOWN_ENTRY.message} (${UNKNOWN_ENTRY.numericCode})`;
}
