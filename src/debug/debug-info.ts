/**
 * Debug metadata collected while assembling: breakpoints, label names for
 * annotated listings, and the verbosity flag that enables both.
 */
export class DebugInfo {
  private breakpointSet = new Set<number>();
  private labels = new Map<number, string>();
  private verboseFlag = false;

  addBreakpoint(address: number): void {
    this.breakpointSet.add(address);
  }

  breakpointAt(address: number): boolean {
    return this.breakpointSet.has(address);
  }

  /** Breakpoint addresses in ascending order */
  breakpoints(): number[] {
    return [...this.breakpointSet].sort((a, b) => a - b);
  }

  addLabel(address: number, label: string): void {
    this.labels.set(address, label);
  }

  labelAt(address: number): string | undefined {
    return this.labels.get(address);
  }

  get verbose(): boolean {
    return this.verboseFlag;
  }

  setVerbose(verbose: boolean): void {
    this.verboseFlag = verbose;
  }
}
