import { encode, isMnemonic, OFFSET_MAX, OFFSET_MIN } from './encoder.js';
import { AssemblerError, AssemblerSyntaxError, OperandRangeError, UnknownOpcodeError } from './errors.js';
import { isValidLabel, LabelTable, type ReadonlyLabelTable } from './label-table.js';
import { formatMachineCode } from './machine-code.js';
import {
  FILL_DIRECTIVE,
  type AssembleOptions,
  type AssembleResult,
  type AssemblerDiagnostic,
  type ListingRecord,
  type Operation,
  type SymbolEntry
} from './types.js';

interface ParsedLine {
  line: number;
  raw: string;
  label?: string;
  operation: Operation;
  operands: string[];
}

interface AssembledProgram {
  words: number[];
  listing: ListingRecord[];
  symbols: SymbolEntry[];
}

export const MEMORY_WORDS = 0x10000;

const WORD_MIN = -0x80000000;
const WORD_LIMIT = 0x100000000;

const TOKEN_PATTERN = /\S+/g;
const INTEGER_PATTERN = /^-?\d+$/;
const REGISTER_PATTERN = /^[rR]?(\d+)$/;
const MNEMONIC_LIKE_PATTERN = /^\.?[A-Za-z][A-Za-z0-9]*$/;

function stripComment(text: string): string {
  const hash = text.indexOf('#');
  return hash === -1 ? text : text.slice(0, hash);
}

function isOperation(token: string): token is Operation {
  return token === FILL_DIRECTIVE || isMnemonic(token);
}

function withLocation<T>(line: number, raw: string, action: () => T): T {
  try {
    return action();
  } catch (error) {
    if (error instanceof AssemblerError) {
      throw error.locate(line, raw);
    }
    throw error;
  }
}

function parseLine(text: string, line: number): ParsedLine | undefined {
  const body = stripComment(text).trim();
  const tokens = body.match(TOKEN_PATTERN);
  if (!tokens) {
    return undefined;
  }

  return withLocation<ParsedLine>(line, body, () => {
    const first = tokens[0] ?? '';
    const second = tokens[1];

    if (isOperation(first)) {
      return { line, raw: body, operation: first, operands: tokens.slice(1) };
    }

    // 先頭トークンがラベルとみなされるのは、次のトークンが命令のときだけ。
    if (second !== undefined && isOperation(second)) {
      if (!isValidLabel(first)) {
        throw new AssemblerSyntaxError(`Invalid label '${first}'`);
      }
      return { line, raw: body, label: first, operation: second, operands: tokens.slice(2) };
    }

    if (second === undefined && isValidLabel(first)) {
      throw new AssemblerSyntaxError(`Missing opcode after label '${first}'`);
    }
    const misspelled = second !== undefined && isValidLabel(first) && MNEMONIC_LIKE_PATTERN.test(second);
    throw new UnknownOpcodeError(misspelled ? second : first);
  });
}

function expectOperandCount(parsed: ParsedLine, expected: number): void {
  if (parsed.operands.length !== expected) {
    throw new AssemblerSyntaxError(
      `${parsed.operation} expects ${expected} operand(s), got ${parsed.operands.length}`
    );
  }
}

function parseRegister(token: string): number {
  const match = token.match(REGISTER_PATTERN);
  if (!match) {
    throw new AssemblerSyntaxError(`Register must be numeric: '${token}'`);
  }
  return Number(match[1] ?? '');
}

function resolveSymbolic(token: string, labels: ReadonlyLabelTable): number {
  if (INTEGER_PATTERN.test(token)) {
    return Number(token);
  }
  if (!isValidLabel(token)) {
    throw new AssemblerSyntaxError(`Invalid operand '${token}'`);
  }
  return labels.resolve(token);
}

function resolveBranchOffset(token: string, index: number, labels: ReadonlyLabelTable): number {
  if (INTEGER_PATTERN.test(token)) {
    return Number(token);
  }
  const offset = resolveSymbolic(token, labels) - (index + 1);
  if (offset < OFFSET_MIN || offset > OFFSET_MAX) {
    throw new OperandRangeError(`branch offset out of 16-bit range: ${offset}`);
  }
  return offset;
}

function resolveFill(token: string, labels: ReadonlyLabelTable): number {
  const value = resolveSymbolic(token, labels);
  if (value < WORD_MIN || value >= WORD_LIMIT) {
    throw new OperandRangeError(`.fill value does not fit in 32 bits: ${token}`);
  }
  return value | 0;
}

function encodeLine(parsed: ParsedLine, index: number, labels: ReadonlyLabelTable): number {
  const ops = parsed.operands;
  switch (parsed.operation) {
    case FILL_DIRECTIVE:
      expectOperandCount(parsed, 1);
      return resolveFill(ops[0] ?? '', labels);
    case 'add':
    case 'nand':
      expectOperandCount(parsed, 3);
      return encode(
        parsed.operation,
        parseRegister(ops[0] ?? ''),
        parseRegister(ops[1] ?? ''),
        parseRegister(ops[2] ?? '')
      );
    case 'lw':
    case 'sw':
      expectOperandCount(parsed, 3);
      return encode(
        parsed.operation,
        parseRegister(ops[0] ?? ''),
        parseRegister(ops[1] ?? ''),
        resolveSymbolic(ops[2] ?? '', labels)
      );
    case 'beq':
      expectOperandCount(parsed, 3);
      return encode(
        'beq',
        parseRegister(ops[0] ?? ''),
        parseRegister(ops[1] ?? ''),
        resolveBranchOffset(ops[2] ?? '', index, labels)
      );
    case 'jalr':
      expectOperandCount(parsed, 2);
      return encode('jalr', parseRegister(ops[0] ?? ''), parseRegister(ops[1] ?? ''));
    case 'halt':
    case 'noop':
      expectOperandCount(parsed, 0);
      return encode(parsed.operation);
  }
}

// pass 1: 行を解析しながら、命令番号でラベルを登録する。
function scanLines(source: string): { lines: ParsedLine[]; labels: LabelTable } {
  const lines: ParsedLine[] = [];
  const labels = new LabelTable();
  const normalized = source.replace(/\r\n?/g, '\n').split('\n');
  for (let idx = 0; idx < normalized.length; idx += 1) {
    const parsed = parseLine(normalized[idx] ?? '', idx + 1);
    if (!parsed) {
      continue;
    }
    if (lines.length >= MEMORY_WORDS) {
      throw new OperandRangeError(`Program exceeds ${MEMORY_WORDS} words`).locate(parsed.line, parsed.raw);
    }
    const { label } = parsed;
    if (label !== undefined) {
      withLocation(parsed.line, parsed.raw, () => labels.define(label, lines.length));
    }
    lines.push(parsed);
  }
  return { lines, labels };
}

function assembleProgram(source: string): AssembledProgram {
  const { lines, labels } = scanLines(source);

  const words: number[] = [];
  const listing: ListingRecord[] = [];
  lines.forEach((parsed, index) => {
    const word = withLocation(parsed.line, parsed.raw, () => encodeLine(parsed, index, labels));
    words.push(word);
    listing.push({ line: parsed.line, address: index, word, source: parsed.raw });
  });

  return { words, listing, symbols: labels.entries() };
}

function toHex(value: number, width: number): string {
  return (value >>> 0).toString(16).toUpperCase().padStart(width, '0');
}

function formatListing(records: ListingRecord[]): string {
  return records.map((record) => `${toHex(record.address, 4)}: ${toHex(record.word, 8)} | ${record.source}`).join('\n');
}

function formatSymbols(symbols: SymbolEntry[]): string {
  const sorted = [...symbols].sort((a, b) => {
    if (a.address !== b.address) {
      return a.address - b.address;
    }
    return a.name.localeCompare(b.name);
  });
  return sorted.map((entry) => `${entry.name.padEnd(6, ' ')} = ${entry.address}`).join('\n');
}

function toDiagnostic(error: AssemblerError, file: string): AssemblerDiagnostic {
  return {
    severity: 'error',
    code: error.code,
    message: error.detail,
    file,
    line: error.line ?? 0,
    column: 1,
    source: error.source ?? ''
  };
}

// 最初の AssemblerError をそのまま投げる。
export function assembleWords(source: string): number[] {
  return assembleProgram(source).words;
}

export function assemble(source: string, options: AssembleOptions = {}): AssembleResult {
  const filename = options.filename ?? '<memory>';

  try {
    const { words, listing, symbols } = assembleProgram(source);
    return {
      ok: true,
      words,
      mc: formatMachineCode(words),
      lst: formatListing(listing),
      sym: formatSymbols(symbols),
      listing,
      symbols,
      diagnostics: []
    };
  } catch (error) {
    if (!(error instanceof AssemblerError)) {
      throw error;
    }
    return {
      ok: false,
      words: [],
      mc: '',
      lst: '',
      sym: '',
      listing: [],
      symbols: [],
      diagnostics: [toDiagnostic(error, filename)],
      error
    };
  }
}
