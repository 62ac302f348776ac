import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { main } from '../src/cli.js';
import { loadProgram } from '../src/binary/container.js';
import { push } from '../src/isa/instruction.js';
import { OPCODE } from '../src/isa/opcodes.js';
import { BufferedOutput } from '../src/vm/output.js';

describe('CLI', () => {
  const testDir = join(tmpdir(), 'spvm-cli-test-' + Date.now());
  let consoleLogs: string[] = [];
  let consoleErrors: string[] = [];
  let originalLog: typeof console.log;
  let originalError: typeof console.error;
  let output: BufferedOutput;

  function source(name: string, text: string): string {
    const path = join(testDir, name);
    writeFileSync(path, text);
    return path;
  }

  function cli(...args: string[]): number {
    return main(['node', 'cli.js', ...args], { output, trace: new BufferedOutput() });
  }

  beforeEach(() => {
    mkdirSync(testDir, { recursive: true });
    consoleLogs = [];
    consoleErrors = [];
    output = new BufferedOutput();
    originalLog = console.log;
    originalError = console.error;
    console.log = (...args) => consoleLogs.push(args.join(' '));
    console.error = (...args) => consoleErrors.push(args.join(' '));
  });

  afterEach(() => {
    console.log = originalLog;
    console.error = originalError;
    rmSync(testDir, { recursive: true, force: true });
  });

  describe('argument parsing', () => {
    it('should show help with no arguments', () => {
      expect(cli()).toBe(1);
      expect(consoleLogs.some(l => l.includes('Usage'))).toBe(true);
    });

    it('should show help with --help', () => {
      expect(cli('--help')).toBe(0);
      expect(consoleLogs.some(l => l.includes('Usage'))).toBe(true);
    });

    it('should error on unknown option', () => {
      expect(cli('prog.asm', '--fast')).toBe(1);
      expect(consoleErrors).toContain("Error: Unknown option '--fast'");
    });

    it('should error when -o is missing filename', () => {
      expect(cli('prog.asm', '-o')).toBe(1);
      expect(consoleErrors).toContain('Error: -o requires an output filename');
    });

    it('should error without an input file', () => {
      expect(cli('-r')).toBe(1);
      expect(consoleErrors).toContain('Error: No input file specified');
    });
  });

  describe('running', () => {
    it('should assemble and run a program', () => {
      const path = source('square.asm', 'PUSH 4\nPUSH 5\nADD\nDUP\nMUL\nPRINTOUT\nEXIT\n');
      expect(cli(path, '-a', '-r')).toBe(0);
      expect(output.text).toBe('81\n');
      expect(consoleLogs).toContain('[simulation exited with code 0]');
      expect(existsSync(join(testDir, 'square.spvm'))).toBe(false);
    });

    it('should report the program exit code without failing', () => {
      const path = source('seven.asm', 'PUSH 7\nEXIT\n');
      expect(cli(path, '--assemble', '--run')).toBe(0);
      expect(consoleLogs).toContain('[simulation exited with code 7]');
    });

    it('should fail on an execution fault', () => {
      const path = source('pop.asm', 'POP\n');
      expect(cli(path, '-a', '-r')).toBe(1);
      expect(consoleErrors).toEqual(['ExecutionFault: (@0000) not enough values on stack for `POP`']);
    });

    it('should fail on a parse error', () => {
      const path = source('bad.asm', 'PUSH 1\nBOGUS\n');
      expect(cli(path, '-a', '-r')).toBe(1);
      expect(consoleErrors).toEqual([`ParseError: ${path}:2: no such mnemonic \`BOGUS\``]);
    });

    it('should fail on a missing input file', () => {
      const path = join(testDir, 'nonexistent.asm');
      expect(cli(path, '-a', '-r')).toBe(1);
      expect(consoleErrors).toEqual([`FileError: File not found: ${path}`]);
    });
  });

  describe('binaries', () => {
    it('should write a binary next to the source by default', () => {
      const path = source('prog.asm', 'PUSH 1\nEXIT\n');
      expect(cli(path, '-a')).toBe(0);
      const binary = join(testDir, 'prog.spvm');
      expect(loadProgram(binary)).toEqual([push(1n), { opcode: OPCODE.EXIT }]);
      expect(consoleLogs).toContain(`Wrote 2 instructions to ${binary}`);
    });

    it('should write a binary with -o and run it', () => {
      const path = source('hello.asm', '@PushStr "hi"\nPRINTSTR\nEXIT\n');
      const binary = join(testDir, 'out.bin');
      expect(cli(path, '-a', '-o', binary)).toBe(0);
      expect(cli(binary, '-r')).toBe(0);
      expect(output.text).toBe('hi');
    });

    it('should reject a source file loaded as a binary', () => {
      const path = source('prog.asm', 'PUSH 1\nEXIT\n');
      expect(cli(path, '-r')).toBe(1);
      expect(consoleErrors).toEqual([`LoadError: ${path}: wrong file format`]);
    });
  });

  describe('disassembly', () => {
    it('should print the listing with labels', () => {
      const path = source('loop.asm', 'top:\nPUSH top\nJMP\n');
      expect(cli(path, '-a', '-d')).toBe(0);
      expect(consoleLogs).toEqual(['top:\n0000      PUSH      0\n0001      JMP']);
      expect(existsSync(join(testDir, 'loop.spvm'))).toBe(false);
    });

    it('should print the listing before running', () => {
      const path = source('two.asm', 'PUSH 2\nEXIT\n');
      expect(cli(path, '-a', '-d', '-r')).toBe(0);
      expect(consoleLogs).toEqual(['0000      PUSH      2\n0001      EXIT', '[simulation exited with code 2]']);
    });
  });
});
