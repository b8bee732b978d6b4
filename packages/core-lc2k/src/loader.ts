import { SimulatorError } from './errors.js';

const WORD_PATTERN = /^-?\d+$/;
const WORD_MIN = -0x80000000;
const WORD_LIMIT = 0x100000000;

// 1 行 1 ワードの 10 進数。符号なし表記は符号付き 32bit に畳み込む。
export function parseMachineCode(text: string): number[] {
  const words: number[] = [];
  const lines = text.replace(/\r\n?/g, '\n').split('\n');
  for (let idx = 0; idx < lines.length; idx += 1) {
    const token = (lines[idx] ?? '').trim();
    if (token.length === 0) {
      continue;
    }
    const value = WORD_PATTERN.test(token) ? Number(token) : Number.NaN;
    if (Number.isNaN(value) || value < WORD_MIN || value >= WORD_LIMIT) {
      throw new SimulatorError('INVALID_MACHINE_CODE', `Line ${idx + 1}: invalid machine word '${token}'`);
    }
    words.push(value | 0);
  }
  return words;
}
