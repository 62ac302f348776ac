#!/usr/bin/env node
/**
 * SPVM CLI
 *
 * Usage: spvm <file> [-a] [-r] [-v] [-d] [-o output.spvm]
 */

import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { assembleFile } from './assembler/assembler.js';
import { loadProgram, saveProgram } from './binary/container.js';
import { DebugInfo } from './debug/debug-info.js';
import { disassemble } from './debug/disassembler.js';
import type { Program } from './isa/instruction.js';
import { StackMachine } from './vm/stack-machine.js';
import type { StackMachineOptions } from './vm/stack-machine.js';

export interface CliOptions {
  inputFile: string;
  outputFile: string;
  assemble: boolean;
  run: boolean;
  verbose: boolean;
  disassemble: boolean;
}

function parseArgs(args: string[]): CliOptions | null {
  const cliArgs = args.slice(2); // Skip node and script path

  if (cliArgs.length === 0) {
    return null;
  }

  let inputFile = '';
  let outputFile = '';
  let assemble = false;
  let run = false;
  let verbose = false;
  let listing = false;

  for (let i = 0; i < cliArgs.length; i++) {
    const arg = cliArgs[i];

    if (arg === '-o' || arg === '--output') {
      if (i + 1 >= cliArgs.length) {
        console.error('Error: -o requires an output filename');
        return null;
      }
      outputFile = cliArgs[++i];
    } else if (arg === '-a' || arg === '--assemble') {
      assemble = true;
    } else if (arg === '-r' || arg === '--run') {
      run = true;
    } else if (arg === '-v' || arg === '--verbose') {
      verbose = true;
    } else if (arg === '-d' || arg === '--disassemble') {
      listing = true;
    } else if (arg === '-h' || arg === '--help') {
      return null;
    } else if (!arg.startsWith('-')) {
      inputFile = arg;
    } else {
      console.error(`Error: Unknown option '${arg}'`);
      return null;
    }
  }

  if (!inputFile) {
    console.error('Error: No input file specified');
    return null;
  }

  // Nothing else requested: write the binary next to the input
  if (!outputFile && !run && !listing) {
    outputFile = inputFile.replace(/\.(asm|s)$/i, '') + '.spvm';
  }

  return { inputFile, outputFile, assemble, run, verbose, disassemble: listing };
}

function printUsage(): void {
  console.log(`SPVM stack machine

Usage: spvm <file> [options]

Options:
  -a, --assemble       Input is assembly source (default: .SPVM binary)
  -r, --run            Run the program
  -v, --verbose        Print listings and stop at breakpoints
  -d, --disassemble    Print the program listing
  -o, --output <file>  Write the program as a .SPVM binary
  -h, --help           Show this help message

Examples:
  spvm hello.asm -a -r
  spvm hello.asm -a -o hello.spvm
  spvm hello.spvm -r -v`);
}

function load(options: CliOptions): { program: Program; debugInfo: DebugInfo } {
  if (options.assemble) {
    const { program, debugInfo } = assembleFile(options.inputFile);
    return { program, debugInfo };
  }
  // Binaries carry no labels or breakpoints
  return { program: loadProgram(options.inputFile), debugInfo: new DebugInfo() };
}

export function main(args: string[] = process.argv, machineOptions: StackMachineOptions = {}): number {
  const options = parseArgs(args);

  if (!options) {
    printUsage();
    return args.some(a => a === '-h' || a === '--help') ? 0 : 1;
  }

  try {
    const { program, debugInfo } = load(options);
    debugInfo.setVerbose(options.verbose);

    if (options.disassemble) {
      console.log(disassemble(program, { debugInfo }).join('\n'));
    }

    if (options.outputFile) {
      saveProgram(options.outputFile, program);
      console.log(`Wrote ${program.length} instructions to ${options.outputFile}`);
    }

    if (options.run) {
      const machine = new StackMachine(program, { ...machineOptions, debugInfo });
      const exitCode = machine.run();
      console.log(`[simulation exited with code ${exitCode}]`);
    }
  } catch (e: unknown) {
    console.error(e instanceof Error ? `${e.name}: ${e.message}` : `Error: ${String(e)}`);
    return 1;
  }

  return 0;
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (script === undefined) {
    return false;
  }
  try {
    return realpathSync(script) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

// Run if executed directly
if (isEntryPoint()) {
  process.exit(main());
}
