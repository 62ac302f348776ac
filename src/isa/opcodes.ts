/**
 * SPVM opcode table
 *
 * Opcode IDs appear only in the binary encoding; mnemonics appear only in
 * assembly text.
 */

export const OPCODE = {
  PUSH: 0, // push imm64
  POP: 1,
  DUP: 2,
  SWAP: 3,
  JZ: 4, // pop target, pop cond; jump if cond == 0
  JNZ: 5, // pop target, pop cond; jump if cond != 0
  JMP: 6, // pop target
  ADD: 7,
  SUB: 8,
  MUL: 9,
  DIV: 10,
  EXIT: 11,
  PRINTOUT: 12,
  CALL: 13, // pop target, push return address
  PRINTSTR: 14,
} as const;

export type Mnemonic = keyof typeof OPCODE;
export type Opcode = (typeof OPCODE)[Mnemonic];

const MNEMONICS: Record<Opcode, Mnemonic> = {
  0: 'PUSH',
  1: 'POP',
  2: 'DUP',
  3: 'SWAP',
  4: 'JZ',
  5: 'JNZ',
  6: 'JMP',
  7: 'ADD',
  8: 'SUB',
  9: 'MUL',
  10: 'DIV',
  11: 'EXIT',
  12: 'PRINTOUT',
  13: 'CALL',
  14: 'PRINTSTR',
};

const OPCODES_BY_MNEMONIC = new Map<string, Opcode>(Object.entries(OPCODE));

export function isOpcode(id: number): id is Opcode {
  return Number.isInteger(id) && id >= OPCODE.PUSH && id <= OPCODE.PRINTSTR;
}

export function mnemonicFor(opcode: Opcode): Mnemonic {
  return MNEMONICS[opcode];
}

/**
 * Look up an opcode by mnemonic. Matching is exact: mnemonics are upper case.
 */
export function opcodeFromMnemonic(text: string): Opcode | undefined {
  return OPCODES_BY_MNEMONIC.get(text);
}
