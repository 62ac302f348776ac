/**
 * SPVM Disassembler
 *
 * Renders programs as annotated listings (for verbose runs and breakpoints)
 * or as assembly text that assembles back to the same program.
 */

import { formatAddress } from '../errors.js';
import { OPCODE } from '../isa/opcodes.js';
import { formatInstruction, mnemonicOf } from '../isa/instruction.js';
import type { Program, Value } from '../isa/instruction.js';
import type { DebugInfo } from './debug-info.js';

export const DEFAULT_WIDTH = 80;

export interface ListingOptions {
  debugInfo?: DebugInfo;
  /** Address to mark with `>>` */
  ip?: number;
}

export interface StateOptions extends ListingOptions {
  stack: readonly Value[];
  width?: number;
}

/**
 * One line per instruction: `AAAA >> * MNEMONIC  arg`, preceded by a
 * `name:` line where a label points at the address.
 */
export function disassemble(program: Program, options: ListingOptions = {}): string[] {
  const { debugInfo, ip } = options;
  const lines: string[] = [];

  program.forEach((instruction, address) => {
    const label = debugInfo?.labelAt(address);
    if (label !== undefined) {
      lines.push(`${label}:`);
    }
    const marker = address === ip ? '>>' : '  ';
    const breakpoint = debugInfo?.breakpointAt(address) ? '*' : ' ';
    lines.push(`${formatAddress(address)} ${marker} ${breakpoint} ${formatInstruction(instruction)}`);
  });

  return lines;
}

/** Bottom of the stack first */
export function formatStack(stack: readonly Value[]): string[] {
  if (stack.length === 0) {
    return ['<no entries>'];
  }
  return stack.map((value, index) => `${formatAddress(index).padEnd(6)}${value}`);
}

export function header(title: string, width: number = DEFAULT_WIDTH): string {
  const padding = ':'.repeat(Math.max(0, Math.floor(width / 2) - Math.floor(title.length / 2) - 1));
  return `${padding} ${title} ${padding}`;
}

/**
 * Listing plus stack snapshot, as printed at breakpoints.
 */
export function renderState(program: Program, options: StateOptions): string {
  const width = options.width ?? DEFAULT_WIDTH;
  return [
    '',
    header('Instructions', width),
    '',
    ...disassemble(program, options),
    '',
    header('Stack', width),
    '',
    ...formatStack(options.stack),
    '',
  ].join('\n');
}

/**
 * Assembly text for a program. Labels and breakpoints are written back when
 * debug info is given; PUSH operands stay numeric.
 */
export function toSource(program: Program, debugInfo?: DebugInfo): string {
  const lines: string[] = [];

  const annotate = (address: number): void => {
    const label = debugInfo?.labelAt(address);
    if (label !== undefined) {
      lines.push(`${label}:`);
    }
    if (debugInfo?.breakpointAt(address)) {
      lines.push('    @Break');
    }
  };

  program.forEach((instruction, address) => {
    annotate(address);
    const text = instruction.opcode === OPCODE.PUSH
      ? `${mnemonicOf(instruction)} ${instruction.arg}`
      : mnemonicOf(instruction);
    lines.push(`    ${text}`);
  });
  annotate(program.length);

  return lines.map((line) => line + '\n').join('');
}
