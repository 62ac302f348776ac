/**
 * Error types shared by the assembler, binary container and stack machine.
 */

/** Exit code a machine reports after a fault */
export const FAULT_EXIT_CODE = 255n;

export class ParseError extends Error {
  constructor(
    public reason: string,
    public file: string,
    public line: number
  ) {
    super(`${file}:${line}: ${reason}`);
    this.name = 'ParseError';
  }
}

/**
 * Raised at end of input when labels are still referenced but were never
 * defined.
 */
export class UnresolvedLabelError extends ParseError {
  constructor(
    public pending: ReadonlyMap<string, readonly number[]>,
    file: string,
    line: number
  ) {
    const names = [...pending.entries()]
      .map(([name, addrs]) => `'${name}' (referenced at ${addrs.map(formatAddress).join(', ')})`)
      .join(', ');
    super(`could not resolve labels ${names}`, file, line);
    this.name = 'UnresolvedLabelError';
  }
}

export class DecodeError extends Error {
  constructor(message: string, public offset: number) {
    super(`${message} at byte ${offset}`);
    this.name = 'DecodeError';
  }
}

export class LoadError extends Error {
  constructor(public reason: string, public file?: string) {
    super(file === undefined ? reason : `${file}: ${reason}`);
    this.name = 'LoadError';
  }
}

export class FileError extends Error {
  constructor(message: string, public path: string, public code?: string) {
    super(`${message}: ${path}`);
    this.name = 'FileError';
  }

  static from(e: unknown, action: string, path: string): FileError {
    const code = e instanceof Error && 'code' in e && typeof e.code === 'string' ? e.code : undefined;
    if (code === 'ENOENT') {
      return new FileError('File not found', path, code);
    }
    return new FileError(`Cannot ${action} file`, path, code);
  }
}

export class ExecutionFault extends Error {
  readonly exitCode = FAULT_EXIT_CODE;

  constructor(
    public reason: string,
    public address: number,
    public mnemonic?: string
  ) {
    super(`(@${formatAddress(address)}) ${reason}`);
    this.name = 'ExecutionFault';
  }
}

/** Four-digit hex address, as shown in listings */
export function formatAddress(address: number): string {
  return address.toString(16).padStart(4, '0');
}
