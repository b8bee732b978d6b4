import type { ExecutionLogEntry, SimulationResult } from './types.js';

export function formatRegisters(pc: number, registers: readonly number[]): string {
  const regs = registers.map((value, index) => `r${index}:${value}`).join(' ');
  return `pc:${pc}  ${regs}`;
}

export function formatLogEntry(entry: ExecutionLogEntry): string {
  return `${formatRegisters(entry.pc, entry.registers)}  | ${entry.instruction}`;
}

export function formatReport(result: SimulationResult): string {
  const { report } = result;
  const lines = [
    result.fault ? `machine faulted: ${result.fault.message} (pc ${result.fault.pc})` : 'machine halted',
    `instructions executed: ${report.instructionsExecuted}`,
    formatRegisters(report.pc, report.registers),
    '--- memory state ---',
    ...report.memory.map(({ address, value }) => `mem[${address}] = ${value}`)
  ];
  return lines.join('\n');
}
