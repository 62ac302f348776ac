/**
 * SPVM
 *
 * Assembler, binary container and stack machine for the SPVM bytecode.
 */

export * from './errors.js';
export * from './isa/index.js';
export * from './assembler/index.js';
export * from './binary/index.js';
export * from './debug/index.js';
export * from './vm/index.js';
export { main as runCli } from './cli.js';
