/**
 * SPVM Instruction Encoder
 *
 * Record layout: opcode[15:0] little-endian, followed for PUSH only by the
 * operand as a 64-bit little-endian two's-complement integer.
 */

import { DecodeError } from '../errors.js';
import { OPCODE, isOpcode } from './opcodes.js';
import { push } from './instruction.js';
import type { Instruction } from './instruction.js';

export const OPCODE_SIZE = 2;
export const OPERAND_SIZE = 8;

export interface DecodedInstruction {
  instruction: Instruction;
  /** Bytes consumed */
  size: number;
}

export function encodedSize(instruction: Instruction): number {
  return instruction.opcode === OPCODE.PUSH ? OPCODE_SIZE + OPERAND_SIZE : OPCODE_SIZE;
}

export function encodeInstruction(instruction: Instruction): Uint8Array {
  const bytes = new Uint8Array(encodedSize(instruction));
  writeInstruction(bytes, 0, instruction);
  return bytes;
}

/**
 * Encode into an existing buffer, returning the number of bytes written.
 */
export function writeInstruction(buffer: Uint8Array, offset: number, instruction: Instruction): number {
  const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  view.setUint16(offset, instruction.opcode, true);
  if (instruction.opcode === OPCODE.PUSH) {
    view.setBigInt64(offset + OPCODE_SIZE, instruction.arg, true);
    return OPCODE_SIZE + OPERAND_SIZE;
  }
  return OPCODE_SIZE;
}

export function decodeInstruction(bytes: Uint8Array, offset: number = 0): DecodedInstruction {
  if (offset + OPCODE_SIZE > bytes.length) {
    throw new DecodeError('Truncated instruction', offset);
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const id = view.getUint16(offset, true);

  if (!isOpcode(id)) {
    throw new DecodeError(`no such opcode \`${id}\``, offset);
  }

  if (id === OPCODE.PUSH) {
    if (offset + OPCODE_SIZE + OPERAND_SIZE > bytes.length) {
      throw new DecodeError('Truncated operand for `PUSH`', offset);
    }
    return {
      instruction: push(view.getBigInt64(offset + OPCODE_SIZE, true)),
      size: OPCODE_SIZE + OPERAND_SIZE,
    };
  }

  return { instruction: { opcode: id }, size: OPCODE_SIZE };
}
