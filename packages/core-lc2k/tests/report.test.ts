import { describe, expect, it } from 'vitest';

import {
  asDisplayError,
  formatLogEntry,
  formatRegisters,
  formatReport,
  MachineFault,
  simulate,
  SimulatorError
} from '../src/index.js';

describe('report formatting', () => {
  it('formats the register line', () => {
    expect(formatRegisters(3, [0, 1, -2, 3, 4, 5, 6, 7])).toBe('pc:3  r0:0 r1:1 r2:-2 r3:3 r4:4 r5:5 r6:6 r7:7');
  });

  it('formats a log entry with its instruction', () => {
    expect(
      formatLogEntry({ step: 1, pc: 0, registers: [0, 0, 0, 0, 0, 0, 0, 0], instruction: 'lw 0 1 6' })
    ).toBe('pc:0  r0:0 r1:0 r2:0 r3:0 r4:0 r5:0 r6:0 r7:0  | lw 0 1 6');
  });

  it('formats a halted run', () => {
    // noop; halt
    const result = simulate([29360128, 25165824]);
    expect(formatReport(result)).toBe(
      [
        'machine halted',
        'instructions executed: 2',
        'pc:2  r0:0 r1:0 r2:0 r3:0 r4:0 r5:0 r6:0 r7:0',
        '--- memory state ---',
        'mem[0] = 29360128',
        'mem[1] = 25165824'
      ].join('\n')
    );
  });

  it('formats a faulted run', () => {
    const result = simulate([-1]);
    expect(formatReport(result)).toBe(
      [
        'machine faulted: Unknown opcode in word -1 (pc 0)',
        'instructions executed: 0',
        'pc:0  r0:0 r1:0 r2:0 r3:0 r4:0 r5:0 r6:0 r7:0',
        '--- memory state ---',
        'mem[0] = -1'
      ].join('\n')
    );
  });
});

describe('asDisplayError', () => {
  it('appends the catalog code', () => {
    expect(asDisplayError(new MachineFault('PC_OUT_OF_BOUNDS', 3))).toBe('PC OUT OF BOUNDS (S01)');
    expect(asDisplayError(new SimulatorError('PROGRAM_TOO_LARGE', 'Program too big: 2 > 1'))).toBe(
      'Program too big: 2 > 1 (S05)'
    );
    expect(asDisplayError(new Error('boom'))).toBe('boom (S99)');
    expect(asDisplayError('boom')).toBe('UNKNOWN (S99)');
  });
});
