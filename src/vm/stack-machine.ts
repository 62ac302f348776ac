/**
 * SPVM Stack Machine
 *
 * Instruction pointer, one operand stack of 64-bit signed integers, and an
 * exit code that is set once the machine halts. Jump and call targets are
 * popped from the stack.
 */

import { ExecutionFault, FAULT_EXIT_CODE, formatAddress } from '../errors.js';
import { DebugInfo } from '../debug/debug-info.js';
import { renderState } from '../debug/disassembler.js';
import { ConsolePrompt } from '../debug/prompt.js';
import type { BreakpointPrompt } from '../debug/prompt.js';
import { OPCODE } from '../isa/opcodes.js';
import { mnemonicOf } from '../isa/instruction.js';
import type { Instruction, Program, Value } from '../isa/instruction.js';
import { StdoutSink } from './output.js';
import type { OutputSink } from './output.js';

export type MachineState = 'running' | 'halted' | 'faulted';

export interface StackMachineOptions {
  /** Breakpoints, labels and verbosity (default: empty, not verbose) */
  debugInfo?: DebugInfo;
  /** Receives PRINTOUT and PRINTSTR output (default: stdout) */
  output?: OutputSink;
  /** Receives listings in verbose mode (default: stdout) */
  trace?: OutputSink;
  /** Asked at each breakpoint in verbose mode (default: stdin) */
  prompt?: BreakpointPrompt;
  /** Listing width in columns */
  width?: number;
}

const MAX_CODE_POINT = 0x10ffffn;

export class StackMachine {
  private pointer: number = 0;
  private values: Value[] = [];
  private exit: Value | undefined;
  private lastFault: ExecutionFault | undefined;

  private readonly debugInfo: DebugInfo;
  private readonly output: OutputSink;
  private readonly trace: OutputSink;
  private readonly prompt: BreakpointPrompt;
  private readonly width: number | undefined;

  constructor(
    private readonly program: Program,
    options: StackMachineOptions = {}
  ) {
    this.debugInfo = options.debugInfo ?? new DebugInfo();
    this.output = options.output ?? new StdoutSink();
    this.trace = options.trace ?? new StdoutSink();
    this.prompt = options.prompt ?? new ConsolePrompt();
    this.width = options.width;
  }

  get ip(): number {
    return this.pointer;
  }

  /** Copy of the operand stack, bottom first */
  get stack(): Value[] {
    return [...this.values];
  }

  get exitCode(): Value | undefined {
    return this.exit;
  }

  get state(): MachineState {
    if (this.exit === undefined) {
      return 'running';
    }
    return this.lastFault ? 'faulted' : 'halted';
  }

  /**
   * Run until EXIT. Returns the exit code; throws ExecutionFault on any
   * fault, including running past the last instruction. A faulted machine
   * throws the same fault again.
   */
  run(): Value {
    if (this.lastFault) {
      throw this.lastFault;
    }
    if (this.debugInfo.verbose) {
      this.printState();
    }

    let code = this.exit;
    while (code === undefined) {
      this.step();
      code = this.exit;
    }
    return code;
  }

  /**
   * Execute one instruction.
   * Returns true if the machine is still running afterwards.
   */
  step(): boolean {
    if (this.exit !== undefined) {
      return false;
    }

    const instruction = this.program[this.pointer];
    if (instruction === undefined) {
      this.fault('no instruction left');
    }

    if (this.debugInfo.verbose && this.debugInfo.breakpointAt(this.pointer)) {
      this.printState();
      if (!this.prompt.confirm(`breakpoint at ${formatAddress(this.pointer)}, continue?`)) {
        this.fault('aborted at breakpoint', mnemonicOf(instruction));
      }
    }

    this.eval(instruction);
    return this.exit === undefined;
  }

  private eval(instruction: Instruction): void {
    const mnemonic = mnemonicOf(instruction);

    switch (instruction.opcode) {
      case OPCODE.PUSH:
        this.values.push(instruction.arg);
        break;

      case OPCODE.POP:
        this.pop(mnemonic);
        break;

      case OPCODE.DUP: {
        const value = this.pop(mnemonic);
        this.values.push(value, value);
        break;
      }

      case OPCODE.SWAP: {
        const a = this.pop(mnemonic);
        const b = this.pop(mnemonic);
        this.values.push(a, b);
        break;
      }

      case OPCODE.ADD:
      case OPCODE.SUB:
      case OPCODE.MUL:
      case OPCODE.DIV: {
        // a is the top of the stack: SUB computes top - second
        const a = this.pop(mnemonic);
        const b = this.pop(mnemonic);
        this.values.push(this.binop(instruction.opcode, a, b));
        break;
      }

      case OPCODE.JZ:
      case OPCODE.JNZ: {
        const target = this.pop(mnemonic);
        const condition = this.pop(mnemonic);
        const taken = instruction.opcode === OPCODE.JZ ? condition === 0n : condition !== 0n;
        if (taken) {
          this.jump(target, mnemonic);
          return;
        }
        break;
      }

      case OPCODE.JMP:
        this.jump(this.pop(mnemonic), mnemonic);
        return;

      case OPCODE.CALL: {
        const target = this.pop(mnemonic);
        this.values.push(BigInt(this.pointer + 1));
        this.jump(target, mnemonic);
        return;
      }

      case OPCODE.PRINTOUT:
        this.output.write(`${this.pop(mnemonic)}\n`);
        break;

      case OPCODE.PRINTSTR:
        this.printString(mnemonic);
        break;

      case OPCODE.EXIT:
        // The one pop that does not fault: an empty stack exits with 0
        this.exit = this.values.pop() ?? 0n;
        break;
    }

    this.pointer++;
  }

  private binop(opcode: Instruction['opcode'], a: Value, b: Value): Value {
    switch (opcode) {
      case OPCODE.ADD:
        return BigInt.asIntN(64, a + b);
      case OPCODE.SUB:
        return BigInt.asIntN(64, a - b);
      case OPCODE.MUL:
        return BigInt.asIntN(64, a * b);
      case OPCODE.DIV:
        if (b === 0n) {
          this.fault('division by zero', 'DIV');
        }
        return BigInt.asIntN(64, a / b);
      default:
        this.fault('unreachable');
    }
  }

  private printString(mnemonic: string): void {
    for (;;) {
      const value = this.pop(mnemonic);
      if (value === 0n) {
        return;
      }
      if (value < 0n || value > MAX_CODE_POINT) {
        this.fault(`invalid character ${value}`, mnemonic);
      }
      this.output.write(String.fromCodePoint(Number(value)));
    }
  }

  private jump(target: Value, mnemonic: string): void {
    if (target < 0n || target > BigInt(Number.MAX_SAFE_INTEGER)) {
      this.fault(`invalid jump target ${target}`, mnemonic);
    }
    this.pointer = Number(target);
  }

  private pop(mnemonic: string): Value {
    const value = this.values.pop();
    if (value === undefined) {
      this.fault(`not enough values on stack for \`${mnemonic}\``, mnemonic);
    }
    return value;
  }

  private printState(): void {
    this.trace.write(
      renderState(this.program, {
        debugInfo: this.debugInfo,
        ip: this.pointer,
        stack: this.values,
        width: this.width,
      })
    );
  }

  private fault(reason: string, mnemonic?: string): never {
    this.exit = FAULT_EXIT_CODE;
    this.lastFault = new ExecutionFault(reason, this.pointer, mnemonic);
    throw this.lastFault;
  }
}
