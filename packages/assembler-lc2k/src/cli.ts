#!/usr/bin/env node
import path from 'node:path';
import { mkdirSync, readFileSync, realpathSync, writeFileSync } from 'node:fs';
import { pathToFileURL } from 'node:url';

import { assemble } from './assembler.js';
import { getErrorCatalogEntry } from './errors.js';

const DEFAULT_SOURCE = 'input.as';
const DEFAULT_OUTPUT = 'output.mc';

interface CliOptions {
  source: string;
  output: string;
  lst?: string;
  sym?: string;
  help: boolean;
}

function printUsage(): void {
  console.log('Usage: lc2kasm [source.as] [output.mc] [--lst out.lst] [--sym out.sym]');
  console.log(`  source defaults to ./${DEFAULT_SOURCE}, output to ./${DEFAULT_OUTPUT}`);
}

function parseArgs(args: string[]): CliOptions {
  const positional: string[] = [];
  const opts: CliOptions = { source: DEFAULT_SOURCE, output: DEFAULT_OUTPUT, help: false };
  for (let i = 0; i < args.length; i += 1) {
    const token = args[i] ?? '';
    const next = args[i + 1];
    switch (token) {
      case '--lst':
        opts.lst = next;
        i += 1;
        break;
      case '--sym':
        opts.sym = next;
        i += 1;
        break;
      case '-h':
      case '--help':
        opts.help = true;
        break;
      default:
        positional.push(token);
        break;
    }
  }
  opts.source = positional[0] ?? DEFAULT_SOURCE;
  opts.output = positional[1] ?? DEFAULT_OUTPUT;
  return opts;
}

function writeOutput(file: string, contents: string): void {
  mkdirSync(path.dirname(file), { recursive: true });
  writeFileSync(file, contents, 'utf8');
}

export function runCli(argv: string[]): number {
  const opts = parseArgs(argv);
  if (opts.help) {
    printUsage();
    return 0;
  }

  const sourcePath = path.resolve(process.cwd(), opts.source);
  let source = '';
  try {
    source = readFileSync(sourcePath, 'utf8');
  } catch (error) {
    console.error(`Failed to read source: ${sourcePath}`);
    if (error instanceof Error) {
      console.error(error.message);
    }
    return 1;
  }

  const result = assemble(source, { filename: sourcePath });
  if (!result.ok) {
    for (const diag of result.diagnostics) {
      const { numericCode } = getErrorCatalogEntry(diag.code);
      console.error(`${diag.file}:${diag.line}:${diag.column}: ${diag.message} (${numericCode})`);
      if (diag.source.length > 0) {
        console.error(`    ${diag.source}`);
      }
    }
    return 1;
  }

  const outputPath = path.resolve(process.cwd(), opts.output);
  writeOutput(outputPath, result.mc);
  if (opts.lst !== undefined) {
    writeOutput(path.resolve(process.cwd(), opts.lst), `${result.lst}\n`);
  }
  if (opts.sym !== undefined) {
    writeOutput(path.resolve(process.cwd(), opts.sym), `${result.sym}\n`);
  }

  console.log(`Assembled ${result.words.length} words → ${outputPath}`);
  return 0;
}

const invokedAs = process.argv[1];
if (invokedAs !== undefined && import.meta.url === pathToFileURL(realpathSync(invokedAs)).href) {
  process.exit(runCli(process.argv.slice(2)));
}
