/**
 * SPVM Assembler Parser
 *
 * Parses one source line at a time into a statement node. A line holds a
 * comment, a label definition, a metainstruction (`@Name [arg]`) or an
 * instruction with at most one operand.
 */

import { ParseError } from '../errors.js';
import { OPCODE, opcodeFromMnemonic } from '../isa/opcodes.js';
import type { Opcode } from '../isa/opcodes.js';
import { VALUE_MAX, VALUE_MIN } from '../isa/instruction.js';
import type { Value } from '../isa/instruction.js';

export enum NodeType {
  INSTRUCTION = 'INSTRUCTION',
  LABEL = 'LABEL',
  PUSH_STR = 'PUSH_STR',
  BREAK = 'BREAK',
}

export type Operand =
  | { kind: 'number'; value: Value }
  | { kind: 'label'; name: string };

export interface InstructionNode {
  type: NodeType.INSTRUCTION;
  opcode: Opcode;
  operand?: Operand;
  line: number;
}

export interface LabelNode {
  type: NodeType.LABEL;
  name: string;
  line: number;
}

export interface PushStrNode {
  type: NodeType.PUSH_STR;
  text: string;
  line: number;
}

export interface BreakNode {
  type: NodeType.BREAK;
  line: number;
}

export type ASTNode = InstructionNode | LabelNode | PushStrNode | BreakNode;

const INTEGER_LITERAL = /^[+-]?(0[xX][0-9a-fA-F]+|0[bB][01]+|[0-9]+)$/;

/**
 * Parse an integer literal. Returns undefined when the text is not a literal
 * at all (it is then a label reference); throws when it is one but does not
 * fit in 64 bits.
 */
export function parseInteger(text: string): Value | undefined {
  if (!INTEGER_LITERAL.test(text)) {
    return undefined;
  }

  const negative = text.startsWith('-');
  const digits = text.startsWith('-') || text.startsWith('+') ? text.slice(1) : text;
  const magnitude = BigInt(digits);
  const value = negative ? -magnitude : magnitude;

  if (value < VALUE_MIN || value > VALUE_MAX) {
    throw new RangeError(`integer literal out of range: \`${text}\``);
  }
  return value;
}

/**
 * Resolve escapes in the body of a string literal (quotes already removed).
 */
export function unescapeString(body: string): string {
  let value = '';

  for (let i = 0; i < body.length; i++) {
    const char = body[i];
    if (char !== '\\') {
      value += char;
      continue;
    }

    if (i + 1 >= body.length) {
      throw new SyntaxError('unterminated escape sequence');
    }
    const escaped = body[++i];
    switch (escaped) {
      case 'n': value += '\n'; break;
      case 't': value += '\t'; break;
      case '0': value += '\0'; break;
      case '\\': value += '\\'; break;
      default:
        throw new SyntaxError(`unknown escape sequence \`\\${escaped}\``);
    }
  }

  return value;
}

function isComment(token: string): boolean {
  return token.startsWith(';');
}

function withoutComment(tokens: string[]): string[] {
  const start = tokens.findIndex(isComment);
  return start === -1 ? tokens : tokens.slice(0, start);
}

export class Parser {
  constructor(private file: string) {}

  /**
   * Parse a single line. Returns null for blank and comment-only lines.
   */
  parseLine(text: string, line: number): ASTNode | null {
    const trimmed = text.trim();
    if (trimmed === '' || isComment(trimmed)) {
      return null;
    }

    const tokens = trimmed.split(/\s+/);
    const head = tokens[0];

    if (head.endsWith(':')) {
      return this.parseLabel(head.slice(0, -1), withoutComment(tokens.slice(1)), line);
    }

    if (head.startsWith('@')) {
      return this.parseMeta(head.slice(1), tokens.slice(1), line);
    }

    return this.parseInstruction(head, withoutComment(tokens.slice(1)), line);
  }

  private parseLabel(name: string, rest: string[], line: number): LabelNode {
    if (name === '') {
      throw this.error('empty label name', line);
    }
    if (INTEGER_LITERAL.test(name)) {
      throw this.error(`label name \`${name}\` is an integer literal`, line);
    }
    if (rest.length > 0) {
      throw this.error(`unexpected \`${rest[0]}\` after label`, line);
    }
    return { type: NodeType.LABEL, name, line };
  }

  private parseMeta(name: string, args: string[], line: number): PushStrNode | BreakNode {
    switch (name) {
      case 'PushStr':
        return { type: NodeType.PUSH_STR, text: this.parseStringArgument(args, line), line };

      case 'Break': {
        const rest = withoutComment(args);
        if (rest.length > 0) {
          throw this.error(`\`@Break\` takes no argument, found \`${rest[0]}\``, line);
        }
        return { type: NodeType.BREAK, line };
      }

      default:
        throw this.error(`no such metainstruction \`@${name}\``, line);
    }
  }

  /**
   * Whitespace splitting breaks a literal like "a b" into several tokens;
   * they are re-joined with single spaces until one ends with a quote.
   */
  private parseStringArgument(args: string[], line: number): string {
    if (args.length === 0 || isComment(args[0])) {
      throw this.error('`@PushStr` expects one string argument', line);
    }
    if (!args[0].startsWith('"')) {
      throw this.error(`expected string literal, found \`${args[0]}\``, line);
    }

    let literal = args[0];
    let last = 0;
    while (literal.length < 2 || !literal.endsWith('"')) {
      last++;
      if (last >= args.length) {
        throw this.error('unterminated string literal', line);
      }
      literal += ' ' + args[last];
    }

    const rest = withoutComment(args.slice(last + 1));
    if (rest.length > 0) {
      throw this.error(`too many arguments: \`${rest[0]}\``, line);
    }

    try {
      return unescapeString(literal.slice(1, -1));
    } catch (e: unknown) {
      throw this.error(e instanceof Error ? e.message : String(e), line);
    }
  }

  private parseInstruction(mnemonic: string, args: string[], line: number): InstructionNode {
    const opcode = opcodeFromMnemonic(mnemonic);
    if (opcode === undefined) {
      throw this.error(`no such mnemonic \`${mnemonic}\``, line);
    }
    if (args.length > 1) {
      throw this.error(`too many arguments: \`${args[1]}\``, line);
    }

    if (opcode !== OPCODE.PUSH) {
      if (args.length > 0) {
        throw this.error(`\`${mnemonic}\` takes no argument, found \`${args[0]}\``, line);
      }
      return { type: NodeType.INSTRUCTION, opcode, line };
    }

    if (args.length === 0) {
      throw this.error('`PUSH` expects one argument', line);
    }
    return { type: NodeType.INSTRUCTION, opcode, operand: this.parseOperand(args[0], line), line };
  }

  private parseOperand(token: string, line: number): Operand {
    let value: Value | undefined;
    try {
      value = parseInteger(token);
    } catch (e: unknown) {
      throw this.error(e instanceof Error ? e.message : String(e), line);
    }
    return value === undefined ? { kind: 'label', name: token } : { kind: 'number', value };
  }

  private error(reason: string, line: number): ParseError {
    return new ParseError(reason, this.file, line);
  }
}
