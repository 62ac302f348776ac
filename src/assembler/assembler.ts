/**
 * SPVM Assembler
 *
 * Single linear pass with back-patching: forward label references emit a
 * PUSH with a provisional 0 and are recorded in the relocation table; the
 * label definition patches them. Anything still pending at end of input is
 * an unresolved label.
 */

import { readFileSync } from 'fs';
import { FileError, ParseError, UnresolvedLabelError, formatAddress } from '../errors.js';
import { DebugInfo } from '../debug/debug-info.js';
import { createInstruction, push, setArg } from '../isa/instruction.js';
import type { Program } from '../isa/instruction.js';
import { NodeType, Parser } from './parser.js';
import type { ASTNode, InstructionNode, LabelNode, PushStrNode } from './parser.js';

export interface AssemblerResult {
  program: Program;
  debugInfo: DebugInfo;
  /** Label name -> address */
  labels: Map<string, number>;
}

export class Assembler {
  private labels: Map<string, number> = new Map();
  private relocations: Map<string, number[]> = new Map();
  private program: Program = [];
  private debugInfo: DebugInfo = new DebugInfo();

  constructor(
    private source: string,
    private file: string = '<input>'
  ) {}

  assemble(): AssemblerResult {
    this.labels = new Map();
    this.relocations = new Map();
    this.program = [];
    this.debugInfo = new DebugInfo();

    const parser = new Parser(this.file);
    const lines = this.source.split(/\r?\n/);
    if (lines[lines.length - 1] === '') {
      lines.pop(); // trailing newline
    }

    lines.forEach((text, index) => {
      const node = parser.parseLine(text, index + 1);
      if (node) {
        this.emit(node);
      }
    });

    if (this.relocations.size > 0) {
      throw new UnresolvedLabelError(this.relocations, this.file, lines.length);
    }

    return {
      program: this.program,
      debugInfo: this.debugInfo,
      labels: this.labels,
    };
  }

  private emit(node: ASTNode): void {
    switch (node.type) {
      case NodeType.LABEL:
        this.defineLabel(node);
        break;
      case NodeType.PUSH_STR:
        this.emitPushStr(node);
        break;
      case NodeType.BREAK:
        this.debugInfo.addBreakpoint(this.program.length);
        break;
      case NodeType.INSTRUCTION:
        this.emitInstruction(node);
        break;
    }
  }

  private defineLabel(node: LabelNode): void {
    const address = this.program.length;

    const existing = this.labels.get(node.name);
    if (existing !== undefined) {
      throw new ParseError(
        `label '${node.name}' already defined at address ${formatAddress(existing)}`,
        this.file,
        node.line
      );
    }

    const pending = this.relocations.get(node.name);
    if (pending) {
      for (const ref of pending) {
        setArg(this.program[ref], BigInt(address));
      }
      this.relocations.delete(node.name);
    }

    this.labels.set(node.name, address);
    this.debugInfo.addLabel(address, node.name);
  }

  /**
   * Characters are pushed last-to-first after the NUL terminator, so popping
   * yields them in reading order and ends on the terminator.
   */
  private emitPushStr(node: PushStrNode): void {
    const codes = Array.from(node.text, (char) => BigInt(char.codePointAt(0) ?? 0));
    this.program.push(push(0n));
    for (let i = codes.length - 1; i >= 0; i--) {
      this.program.push(push(codes[i]));
    }
  }

  private emitInstruction(node: InstructionNode): void {
    const operand = node.operand;
    if (operand === undefined) {
      this.program.push(createInstruction(node.opcode));
      return;
    }

    if (operand.kind === 'number') {
      this.program.push(createInstruction(node.opcode, operand.value));
      return;
    }

    const address = this.labels.get(operand.name);
    if (address !== undefined) {
      this.program.push(createInstruction(node.opcode, BigInt(address)));
      return;
    }

    const refs = this.relocations.get(operand.name) ?? [];
    refs.push(this.program.length);
    this.relocations.set(operand.name, refs);
    this.program.push(createInstruction(node.opcode, 0n));
  }
}

export function assemble(source: string, file?: string): AssemblerResult {
  return new Assembler(source, file).assemble();
}

/**
 * Read and assemble a source file.
 */
export function assembleFile(path: string): AssemblerResult {
  let source: string;
  try {
    source = readFileSync(path, 'utf-8');
  } catch (e: unknown) {
    throw FileError.from(e, 'read', path);
  }
  return assemble(source, path);
}
