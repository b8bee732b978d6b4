import { disassemble } from './disassembler.js';
import { step } from './executor.js';
import { MachineState } from './machine-state.js';
import type {
  ExecutionLogEntry,
  FaultInfo,
  MachineSnapshot,
  SimulationReport,
  SimulationResult,
  SimulatorOptions,
  SimulatorStatus
} from './types.js';

// halted / faulted は終端状態。maxSteps 未指定なら実行数の上限なし。
export class Simulator {
  readonly state: MachineState;

  private readonly options: SimulatorOptions;

  private readonly log: ExecutionLogEntry[] = [];

  private status: SimulatorStatus = 'running';

  private executed = 0;

  private fault: FaultInfo | undefined;

  constructor(program: readonly number[], options?: SimulatorOptions) {
    this.state = new MachineState(program);
    this.options = options ?? {};
  }

  getStatus(): SimulatorStatus {
    return this.status;
  }

  getState(): MachineSnapshot {
    return this.state.getState();
  }

  getLog(): readonly ExecutionLogEntry[] {
    return this.log;
  }

  getFault(): FaultInfo | undefined {
    return this.fault;
  }

  stepOnce(): SimulatorStatus {
    if (this.status !== 'running') {
      return this.status;
    }

    const { pc } = this.state;
    if (!this.state.isAddressInBounds(pc)) {
      return this.fail({ code: 'PC_OUT_OF_BOUNDS', pc, message: `PC out of bounds: ${pc}` });
    }

    const { maxSteps } = this.options;
    if (maxSteps !== undefined && this.executed >= maxSteps) {
      return this.fail({ code: 'STEP_LIMIT_EXCEEDED', pc, message: `Step limit ${maxSteps} exceeded` });
    }

    const word = this.state.load(pc);
    const entry: ExecutionLogEntry = {
      step: this.executed + 1,
      pc,
      registers: this.state.getState().registers,
      instruction: disassemble(word)
    };
    if (this.options.recordLog !== false) {
      this.log.push(entry);
    }
    this.options.onStep?.(entry);

    const result = step(word, this.state);
    switch (result.status) {
      case 'continue':
        this.executed += 1;
        return this.status;
      case 'halted':
        this.executed += 1;
        this.status = 'halted';
        return this.status;
      case 'fault':
        return this.fail(result.fault);
    }
  }

  run(): SimulationResult {
    let status = this.status;
    while (status === 'running') {
      status = this.stepOnce();
    }
    return {
      status,
      report: this.getReport(),
      log: [...this.log],
      fault: this.fault
    };
  }

  getReport(): SimulationReport {
    const { registers, pc } = this.state.getState();
    return {
      registers,
      pc,
      instructionsExecuted: this.executed,
      memory: this.state.nonZeroMemory()
    };
  }

  private fail(fault: FaultInfo): SimulatorStatus {
    this.status = 'faulted';
    this.fault = fault;
    this.options.onFault?.(fault);
    return this.status;
  }
}

export function simulate(program: readonly number[], options?: SimulatorOptions): SimulationResult {
  return new Simulator(program, options).run();
}
