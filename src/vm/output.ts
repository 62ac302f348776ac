/**
 * Output sinks for program output and debug listings.
 */

export interface OutputSink {
  write(text: string): void;
}

export class StdoutSink implements OutputSink {
  write(text: string): void {
    process.stdout.write(text);
  }
}

/**
 * Collects everything written, for callers that want the output as a string.
 */
export class BufferedOutput implements OutputSink {
  public text: string = '';

  write(text: string): void {
    this.text += text;
  }

  clear(): void {
    this.text = '';
  }
}
