import type { AssemblerError, AssemblerErrorCode } from './errors.js';

export type DiagnosticSeverity = 'error';

export const LC2K_MNEMONICS = ['add', 'nand', 'lw', 'sw', 'beq', 'jalr', 'halt', 'noop'] as const;

// 命令ニーモニック。配列の添字がそのまま 3bit の opcode になる。
export type Mnemonic = (typeof LC2K_MNEMONICS)[number];

export const FILL_DIRECTIVE = '.fill';

export type Operation = Mnemonic | typeof FILL_DIRECTIVE;

export interface AssembleOptions {
  filename?: string;
}

export interface AssemblerDiagnostic {
  severity: DiagnosticSeverity;
  code: AssemblerErrorCode;
  message: string;
  file: string;
  line: number;
  column: number;
  source: string;
}

export interface SymbolEntry {
  name: string;
  address: number;
}

export interface ListingRecord {
  line: number;
  address: number;
  word: number;
  source: string;
}

export interface AssembleResult {
  ok: boolean;
  words: number[];
  mc: string;
  lst: string;
  sym: string;
  listing: ListingRecord[];
  symbols: SymbolEntry[];
  diagnostics: AssemblerDiagnostic[];
  error?: AssemblerError;
}
