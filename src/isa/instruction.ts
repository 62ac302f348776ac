/**
 * SPVM Instructions
 *
 * Only PUSH carries an operand. Jumps and calls take their target from the
 * operand stack, so label relocation only ever patches PUSH operands.
 */

import { OPCODE, mnemonicFor } from './opcodes.js';
import type { Mnemonic, Opcode } from './opcodes.js';

/** A machine word: 64-bit signed integer */
export type Value = bigint;

export const VALUE_MIN: Value = -(1n << 63n);
export const VALUE_MAX: Value = (1n << 63n) - 1n;

export interface PushInstruction {
  opcode: typeof OPCODE.PUSH;
  arg: Value;
}

export interface PlainInstruction {
  opcode: Exclude<Opcode, typeof OPCODE.PUSH>;
}

export type Instruction = PushInstruction | PlainInstruction;

/** An ordered instruction sequence; addresses are indices */
export type Program = Instruction[];

export function push(arg: Value): PushInstruction {
  return { opcode: OPCODE.PUSH, arg: BigInt.asIntN(64, arg) };
}

/**
 * Build an instruction from an opcode and an optional operand.
 * PUSH requires the operand; every other opcode rejects one.
 */
export function createInstruction(opcode: Opcode, arg?: Value): Instruction {
  if (opcode === OPCODE.PUSH) {
    if (arg === undefined) {
      throw new Error('`PUSH` expects one argument');
    }
    return push(arg);
  }
  if (arg !== undefined) {
    throw new Error(`\`${mnemonicFor(opcode)}\` takes no argument`);
  }
  return { opcode };
}

/**
 * Patch the operand of a PUSH. No-op for every other instruction.
 */
export function setArg(instruction: Instruction, arg: Value): void {
  if (instruction.opcode === OPCODE.PUSH) {
    instruction.arg = BigInt.asIntN(64, arg);
  }
}

export function mnemonicOf(instruction: Instruction): Mnemonic {
  return mnemonicFor(instruction.opcode);
}

export function instructionsEqual(a: Instruction, b: Instruction): boolean {
  if (a.opcode === OPCODE.PUSH) {
    return b.opcode === OPCODE.PUSH && a.arg === b.arg;
  }
  return a.opcode === b.opcode;
}

/**
 * Text form used in listings: mnemonic padded to 10 columns, then the operand.
 */
export function formatInstruction(instruction: Instruction): string {
  if (instruction.opcode === OPCODE.PUSH) {
    return `${mnemonicOf(instruction).padEnd(10)}${instruction.arg}`;
  }
  return mnemonicOf(instruction);
}
