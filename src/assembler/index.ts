/**
 * SPVM Assembler
 *
 * Assembles SPVM assembly source into an instruction sequence.
 */

export * from './parser.js';
export * from './assembler.js';
