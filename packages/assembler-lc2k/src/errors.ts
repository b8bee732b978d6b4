// アセンブラが返すエラーコード定義。
export type AssemblerErrorCode = 'SYNTAX' | 'UNKNOWN_OPCODE' | 'DUPLICATE_LABEL' | 'UNDEFINED_LABEL' | 'RANGE';

export type NumericErrorCode = `A${string}`;

export interface ErrorCatalogEntry {
  code?: AssemblerErrorCode;
  numericCode: NumericErrorCode;
  message: string;
}

export const ERROR_CATALOG: readonly ErrorCatalogEntry[] = [
  { code: 'SYNTAX', numericCode: 'A01', message: 'SYNTAX' },
  { code: 'UNKNOWN_OPCODE', numericCode: 'A02', message: 'UNKNOWN OPCODE' },
  { code: 'DUPLICATE_LABEL', numericCode: 'A03', message: 'DUPLICATE LABEL' },
  { code: 'UNDEFINED_LABEL', numericCode: 'A04', message: 'UNDEFINED LABEL' },
  { code: 'RANGE', numericCode: 'A05', message: 'OUT OF RANGE' },
  { numericCode: 'A99', message: 'UNKNOWN' }
];

const UNKNOWN_ENTRY: ErrorCatalogEntry = ERROR_CATALOG.find((entry) => entry.numericCode === 'A99') ?? {
  numericCode: 'A99',
  message: 'UNKNOWN'
};

const BY_CODE = new Map<AssemblerErrorCode, ErrorCatalogEntry>();
for (const entry of ERROR_CATALOG) {
  if (entry.code !== undefined) {
    BY_CODE.set(entry.code, entry);
  }
}

export function getErrorCatalogEntry(code: AssemblerErrorCode): ErrorCatalogEntry {
  return BY_CODE.get(code) ?? UNKNOWN_ENTRY;
}

export class AssemblerError extends Error {
  readonly code: AssemblerErrorCode;

  readonly detail: string;

  line: number | undefined;

  source: string | undefined;

  constructor(code: AssemblerErrorCode, detail: string) {
    super(detail);
    this.name = 'AssemblerError';
    this.code = code;
    this.detail = detail;
  }

  // 行番号 (1 始まり) と元テキストを一度だけ付与する。
  locate(line: number, source: string): this {
    if (this.line === undefined) {
      this.line = line;
      this.source = source;
      this.message = `Line ${line}: ${this.detail}`;
    }
    return this;
  }

  getNumericCode(): NumericErrorCode {
    return getErrorCatalogEntry(this.code).numericCode;
  }

  toDisplayString(): string {
    return `${this.message} (${this.getNumericCode()})`;
  }
}

export class AssemblerSyntaxError extends AssemblerError {
  constructor(detail: string) {
    super('SYNTAX', detail);
    this.name = 'AssemblerSyntaxError';
  }
}

export class UnknownOpcodeError extends AssemblerError {
  readonly mnemonic: string;

  constructor(mnemonic: string) {
    super('UNKNOWN_OPCODE', `Unknown opcode '${mnemonic}'`);
    this.name = 'UnknownOpcodeError';
    this.mnemonic = mnemonic;
  }
}

export class DuplicateLabelError extends AssemblerError {
  readonly label: string;

  constructor(label: string) {
    super('DUPLICATE_LABEL', `Duplicate label '${label}'`);
    this.name = 'DuplicateLabelError';
    this.label = label;
  }
}

export class UndefinedLabelError extends AssemblerError {
  readonly label: string;

  constructor(label: string) {
    super('UNDEFINED_LABEL', `Undefined label '${label}'`);
    this.name = 'UndefinedLabelError';
    this.label = label;
  }
}

export class OperandRangeError extends AssemblerError {
  constructor(detail: string) {
    super('RANGE', detail);
    this.name = 'OperandRangeError';
  }
}

export function asDisplayError(error: unknown): string {
  if (error instanceof AssemblerError) {
    return error.toDisplayString();
  }
  if (error instanceof Error && error.message.length > 0) {
    return `${error.message} (${UNKNOWN_ENTRY.numericCode})`;
  }
  return `${UNKNOWN_ENTRY.message} (${UNKNOWN_ENTRY.numericCode})`;
}
