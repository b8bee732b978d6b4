import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { runCli } from '../src/cli.js';

describe('assembler-lc2k cli', () => {
  it('writes MC/LST/SYM and returns 0 on success', () => {
    const tempDir = mkdtempSync(path.join(os.tmpdir(), 'lc2kasm-'));
    try {
      const input = path.join(tempDir, 'prog.as');
      const outMc = path.join(tempDir, 'out', 'prog.mc');
      const outLst = path.join(tempDir, 'prog.lst');
      const outSym = path.join(tempDir, 'prog.sym');

      writeFileSync(input, 'start lw 0 1 one\n      halt\none   .fill 1\n', 'utf8');

      const code = runCli([input, outMc, '--lst', outLst, '--sym', outSym]);
      expect(code).toBe(0);
      expect(readFileSync(outMc, 'utf8')).toBe('8454146\n25165824\n1\n');
      expect(readFileSync(outLst, 'utf8')).toBe(
        '0000: 00810002 | start lw 0 1 one\n0001: 01800000 | halt\n0002: 00000001 | one   .fill 1\n'
      );
      expect(readFileSync(outSym, 'utf8')).toBe('start  = 0\none    = 2\n');
    } finally {
      rmSync(tempDir, { recursive: true, force: true });
    }
  });

  it('returns 1 and writes nothing when assembly fails', () => {
    const tempDir = mkdtempSync(path.join(os.tmpdir(), 'lc2kasm-'));
    try {
      const input = path.join(tempDir, 'bad.as');
      const output = path.join(tempDir, 'bad.mc');
      writeFileSync(input, 'noop\nbeq 0 0 nowhere\n', 'utf8');

      expect(runCli([input, output])).toBe(1);
      expect(existsSync(output)).toBe(false);
    } finally {
      rmSync(tempDir, { recursive: true, force: true });
    }
  });

  it('returns 1 when the source cannot be read', () => {
    const tempDir = mkdtempSync(path.join(os.tmpdir(), 'lc2kasm-'));
    try {
      expect(runCli([path.join(tempDir, 'missing.as'), path.join(tempDir, 'out.mc')])).toBe(1);
    } finally {
      rmSync(tempDir, { recursive: true, force: true });
    }
  });
});
