export * from './output.js';
export * from './stack-machine.js';
