export * from './debug-info.js';
export * from './disassembler.js';
export * from './prompt.js';
