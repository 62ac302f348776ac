/**
 * SPVM Binary Container
 *
 * File layout:
 *   0x00  5 bytes  magic ".SPVM"
 *   0x05  8 bytes  instruction count (unsigned, little-endian)
 *   0x0D  ...      instruction records, back to back
 *
 * Labels and breakpoints are not stored.
 */

import { readFileSync, writeFileSync } from 'fs';
import { DecodeError, FileError, LoadError } from '../errors.js';
import { OPCODE_SIZE, decodeInstruction, encodedSize, writeInstruction } from '../isa/encoder.js';
import type { Program } from '../isa/instruction.js';

/** ".SPVM" */
export const MAGIC = new Uint8Array([0x2e, 0x53, 0x50, 0x56, 0x4d]);

/** Size of magic + header in bytes */
export const HEADER_SIZE = 0x0d;

const HEADER = {
  MAGIC: 0x00, // 5 bytes
  COUNT: 0x05, // 8 bytes
} as const;

export function serializeProgram(program: Program): Uint8Array {
  const size = program.reduce((total, instruction) => total + encodedSize(instruction), HEADER_SIZE);
  const bytes = new Uint8Array(size);
  const view = new DataView(bytes.buffer);

  bytes.set(MAGIC, HEADER.MAGIC);
  view.setBigUint64(HEADER.COUNT, BigInt(program.length), true);

  let offset = HEADER_SIZE;
  for (const instruction of program) {
    offset += writeInstruction(bytes, offset, instruction);
  }

  return bytes;
}

function hasMagic(bytes: Uint8Array): boolean {
  return bytes.length >= MAGIC.length && MAGIC.every((byte, i) => bytes[HEADER.MAGIC + i] === byte);
}

export function deserializeProgram(bytes: Uint8Array, file?: string): Program {
  if (!hasMagic(bytes)) {
    throw new LoadError('wrong file format', file);
  }
  if (bytes.length < HEADER_SIZE) {
    throw new LoadError('truncated header', file);
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const declared = view.getBigUint64(HEADER.COUNT, true);

  // Every record is at least OPCODE_SIZE bytes
  const maxCount = BigInt(Math.floor((bytes.length - HEADER_SIZE) / OPCODE_SIZE));
  if (declared > maxCount) {
    throw new LoadError(`header declares ${declared} instructions but the file is too short`, file);
  }

  const count = Number(declared);
  const program: Program = [];
  let offset = HEADER_SIZE;

  try {
    while (program.length < count) {
      const { instruction, size } = decodeInstruction(bytes, offset);
      program.push(instruction);
      offset += size;
    }
  } catch (e: unknown) {
    if (e instanceof DecodeError) {
      throw new LoadError(e.message, file);
    }
    throw e;
  }

  return program;
}

/**
 * Write a program to disk. The write is synchronous, so the file is complete
 * when this returns.
 */
export function saveProgram(path: string, program: Program): void {
  const bytes = serializeProgram(program);
  try {
    writeFileSync(path, bytes);
  } catch (e: unknown) {
    throw FileError.from(e, 'write', path);
  }
}

export function loadProgram(path: string): Program {
  let bytes: Uint8Array;
  try {
    bytes = readFileSync(path);
  } catch (e: unknown) {
    throw FileError.from(e, 'read', path);
  }
  return deserializeProgram(bytes, path);
}
