import { describe, it, expect } from 'vitest';
import { join } from 'path';
import { tmpdir } from 'os';
import { fileURLToPath } from 'url';
import { FileError, ParseError, UnresolvedLabelError } from '../../src/errors.js';
import { OPCODE } from '../../src/isa/opcodes.js';
import { push } from '../../src/isa/instruction.js';
import { Assembler, assemble, assembleFile } from '../../src/assembler/assembler.js';

function assembleError(source: string, file?: string): ParseError {
  try {
    assemble(source, file);
  } catch (e: unknown) {
    if (e instanceof ParseError) {
      return e;
    }
    throw e;
  }
  throw new Error('expected assembly to fail');
}

describe('Assembler', () => {
  describe('basic assembly', () => {
    it('should assemble empty source', () => {
      const result = assemble('');
      expect(result.program).toHaveLength(0);
      expect(result.labels.size).toBe(0);
    });

    it('should assemble instructions in order', () => {
      const { program } = assemble(`
        PUSH 4
        PUSH 5
        ADD
      `);
      expect(program).toEqual([push(4n), push(5n), { opcode: OPCODE.ADD }]);
    });

    it('should skip comments', () => {
      const { program } = assemble('; header\nPUSH 1 ; one\n\n; trailer\n');
      expect(program).toEqual([push(1n)]);
    });

    it('should accept CRLF line endings', () => {
      const { program } = assemble('PUSH 1\r\nEXIT\r\n');
      expect(program).toEqual([push(1n), { opcode: OPCODE.EXIT }]);
    });

    it('should reset state between runs', () => {
      const asm = new Assembler('here:\nPUSH here\n');
      expect(asm.assemble().program).toEqual([push(0n)]);
      expect(asm.assemble().program).toEqual([push(0n)]);
    });
  });

  describe('label resolution', () => {
    it('should resolve backward label references immediately', () => {
      const { program, labels } = assemble(`
start:
        PUSH 1
        PUSH start
        JMP
      `);
      expect(labels.get('start')).toBe(0);
      expect(program[1]).toEqual(push(0n));
    });

    it('should patch forward label references', () => {
      const { program, labels } = assemble(`
        PUSH end
        JMP
        PUSH 99
        PRINTOUT
end:
        EXIT
      `);
      expect(labels.get('end')).toBe(4);
      expect(program[0]).toEqual(push(4n));
    });

    it('should patch every reference to the same label', () => {
      const { program } = assemble('PUSH x\nPUSH x\nx:\nEXIT\n');
      expect(program).toEqual([push(2n), push(2n), { opcode: OPCODE.EXIT }]);
    });

    it('should allow a label at the end of the program', () => {
      const { program, labels } = assemble('PUSH done\ndone:\n');
      expect(labels.get('done')).toBe(1);
      expect(program).toEqual([push(1n)]);
    });

    it('should record labels in debug info', () => {
      const { debugInfo } = assemble('PUSH 1\nmain:\nEXIT\n');
      expect(debugInfo.labelAt(1)).toBe('main');
      expect(debugInfo.labelAt(0)).toBeUndefined();
    });

    it('should name an undefined label and its references', () => {
      const err = assembleError('PUSH nowhere\nJMP\n');
      expect(err).toBeInstanceOf(UnresolvedLabelError);
      expect(err.line).toBe(2);
      expect(err.message).toBe("<input>:2: could not resolve labels 'nowhere' (referenced at 0000)");
    });

    it('should report every unresolved label', () => {
      const err = assembleError('PUSH a\nPUSH b\nPUSH a');
      if (!(err instanceof UnresolvedLabelError)) {
        throw err;
      }
      expect([...err.pending.entries()]).toEqual([
        ['a', [0, 2]],
        ['b', [1]],
      ]);
      expect(err.reason).toBe(
        "could not resolve labels 'a' (referenced at 0000, 0002), 'b' (referenced at 0001)"
      );
    });

    it('should reject a redefined label', () => {
      const err = assembleError('x:\nPUSH 1\nx:\n');
      expect(err.line).toBe(3);
      expect(err.reason).toBe("label 'x' already defined at address 0000");
    });
  });

  describe('@PushStr', () => {
    it('should push the terminator first and the first character last', () => {
      const { program } = assemble('@PushStr "hi"');
      expect(program).toEqual([push(0n), push(105n), push(104n)]);
    });

    it('should apply escapes', () => {
      const { program } = assemble('@PushStr "a\\n"');
      expect(program).toEqual([push(0n), push(10n), push(97n)]);
    });

    it('should push code points for non-ASCII text', () => {
      const { program } = assemble('@PushStr "é"');
      expect(program).toEqual([push(0n), push(0xe9n)]);
    });

    it('should advance addresses by the expanded length', () => {
      const { labels } = assemble('@PushStr "ab"\nhere:\nEXIT\n');
      expect(labels.get('here')).toBe(3);
    });
  });

  describe('@Break', () => {
    it('should register a breakpoint at the next address', () => {
      const { program, debugInfo } = assemble('PUSH 1\n@Break\nPOP\n');
      expect(program).toHaveLength(2);
      expect(debugInfo.breakpointAt(1)).toBe(true);
      expect(debugInfo.breakpoints()).toEqual([1]);
    });
  });

  describe('errors', () => {
    it('should report the file and line of a bad line', () => {
      const err = assembleError('PUSH 1\n\nBOGUS\n', 'prog.asm');
      expect(err.message).toBe('prog.asm:3: no such mnemonic `BOGUS`');
    });

    it('should not count a trailing newline as a line', () => {
      expect(assembleError('PUSH a\n').line).toBe(1);
    });
  });

  describe('assembleFile', () => {
    it('should assemble a file from disk', () => {
      const path = fileURLToPath(new URL('../fixtures/square.asm', import.meta.url));
      const { program } = assembleFile(path);
      expect(program).toHaveLength(7);
    });

    it('should fail with FileError on a missing file', () => {
      const path = join(tmpdir(), 'spvm-missing-' + Date.now() + '.asm');
      expect(() => assembleFile(path)).toThrow(FileError);
      expect(() => assembleFile(path)).toThrow(`File not found: ${path}`);
    });
  });
});
