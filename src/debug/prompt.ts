/**
 * Breakpoint confirmation
 *
 * The machine blocks on the prompt at each breakpoint when running verbose.
 * The console prompt reads stdin synchronously; there is no other
 * suspension point in a run.
 */

import { readSync } from 'fs';

export interface BreakpointPrompt {
  /** true to continue, false to abort the run */
  confirm(question: string): boolean;
}

export type Answer = 'continue' | 'abort' | 'invalid';

/**
 * `y`, `yes` or an empty line continue; `n` or `no` abort. End of input
 * (null) aborts.
 */
export function interpretAnswer(input: string | null): Answer {
  if (input === null) {
    return 'abort';
  }
  switch (input.trim().toLowerCase()) {
    case '':
    case 'y':
    case 'yes':
      return 'continue';
    case 'n':
    case 'no':
      return 'abort';
    default:
      return 'invalid';
  }
}

function errorCode(e: unknown): string | undefined {
  return e instanceof Error && 'code' in e && typeof e.code === 'string' ? e.code : undefined;
}

/**
 * Read one line from a file descriptor, blocking. Returns null at end of
 * input when nothing was read.
 */
export function readLineSync(fd: number): string | null {
  const byte = Buffer.alloc(1);
  const bytes: number[] = [];

  for (;;) {
    let read: number;
    try {
      read = readSync(fd, byte, 0, 1, null);
    } catch (e: unknown) {
      const code = errorCode(e);
      if (code === 'EAGAIN') {
        continue; // non-blocking stdin, nothing buffered yet
      }
      if (code === 'EOF') {
        read = 0;
      } else {
        throw e;
      }
    }

    if (read === 0) {
      return bytes.length === 0 ? null : Buffer.from(bytes).toString('utf-8');
    }
    if (byte[0] === 0x0a) {
      return Buffer.from(bytes).toString('utf-8').replace(/\r$/, '');
    }
    bytes.push(byte[0]);
  }
}

export class ConsolePrompt implements BreakpointPrompt {
  constructor(
    private fd: number = 0,
    private write: (text: string) => void = (text) => {
      process.stdout.write(text);
    }
  ) {}

  confirm(question: string): boolean {
    for (;;) {
      this.write(`${question} [Y/n] `);
      const answer = interpretAnswer(readLineSync(this.fd));
      if (answer !== 'invalid') {
        return answer === 'continue';
      }
      this.write('please answer y or n\n');
    }
  }
}
