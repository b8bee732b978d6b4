#!/usr/bin/env node
import path from 'node:path';
import { mkdirSync, readFileSync, realpathSync, writeFileSync } from 'node:fs';
import { pathToFileURL } from 'node:url';

import { asDisplayError, getErrorCatalogEntry } from './errors.js';
import { parseMachineCode } from './loader.js';
import { formatLogEntry, formatReport } from './report.js';
import { Simulator } from './simulator.js';

const DEFAULT_PROGRAM = 'output.mc';
const DEFAULT_LOG = 'result.txt';
const DEFAULT_MAX_STEPS = 1_000_000;

interface CliOptions {
  program: string;
  log: string;
  maxSteps: number;
  quiet: boolean;
  help: boolean;
}

function printUsage(): void {
  console.log('Usage: lc2ksim [program.mc] [--quiet] [--log result.txt] [--max-steps N]');
  console.log(`  program defaults to ./${DEFAULT_PROGRAM}; the full trace is always written to the log file`);
}

function parseArgs(args: string[]): CliOptions | string {
  const opts: CliOptions = {
    program: DEFAULT_PROGRAM,
    log: DEFAULT_LOG,
    maxSteps: DEFAULT_MAX_STEPS,
    quiet: false,
    help: false
  };
  const positional: string[] = [];
  for (let i = 0; i < args.length; i += 1) {
    const token = args[i] ?? '';
    const next = args[i + 1];
    switch (token) {
      case '-q':
      case '--quiet':
        opts.quiet = true;
        break;
      case '--log':
        if (next === undefined) {
          return '--log requires a file name';
        }
        opts.log = next;
        i += 1;
        break;
      case '--max-steps': {
        const value = Number(next);
        if (!Number.isInteger(value) || value <= 0) {
          return `--max-steps requires a positive integer: ${next ?? ''}`;
        }
        opts.maxSteps = value;
        i += 1;
        break;
      }
      case '-h':
      case '--help':
        opts.help = true;
        break;
      default:
        positional.push(token);
        break;
    }
  }
  opts.program = positional[0] ?? DEFAULT_PROGRAM;
  return opts;
}

export function runCli(argv: string[]): number {
  const opts = parseArgs(argv);
  if (typeof opts === 'string') {
    console.error(opts);
    printUsage();
    return 1;
  }
  if (opts.help) {
    printUsage();
    return 0;
  }

  const programPath = path.resolve(process.cwd(), opts.program);
  const logLines: string[] = [];
  let simulator: Simulator;
  try {
    const words = parseMachineCode(readFileSync(programPath, 'utf8'));
    simulator = new Simulator(words, {
      maxSteps: opts.maxSteps,
      recordLog: false,
      onStep: (entry) => {
        const line = formatLogEntry(entry);
        logLines.push(line);
        if (!opts.quiet) {
          console.log(line);
        }
      }
    });
  } catch (error) {
    console.error(`Failed to load program: ${programPath}`);
    console.error(asDisplayError(error));
    return 1;
  }
  const result = simulator.run();

  const report = formatReport(result);
  logLines.push(report);
  if (!opts.quiet) {
    console.log(report);
  }

  const logPath = path.resolve(process.cwd(), opts.log);
  mkdirSync(path.dirname(logPath), { recursive: true });
  writeFileSync(logPath, `${logLines.join('\n')}\n`, 'utf8');

  if (result.fault) {
    const { numericCode } = getErrorCatalogEntry(result.fault.code);
    console.error(`Simulation faulted at pc ${result.fault.pc}: ${result.fault.message} (${numericCode})`);
    return 1;
  }
  return 0;
}

const invokedAs = process.argv[1];
if (invokedAs !== undefined && import.meta.url === pathToFileURL(realpathSync(invokedAs)).href) {
  process.exit(runCli(process.argv.slice(2)));
}
