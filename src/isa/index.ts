/**
 * SPVM Instruction Set
 */

export * from './opcodes.js';
export * from './instruction.js';
export * from './encoder.js';
