/**
 * The parts of an ora spinner that output interleaving needs
 */
export interface Spinner {
  readonly isSpinning: boolean;
  clear(): unknown;
  render(): unknown;
  fail(): unknown;
}

/**
 * Console output that keeps the running spinner on its own line.
 * Lines written while a step runs are printed above the spinner.
 */
export class SpinnerConsole {
  private active: Spinner | undefined;

  constructor(
    private readonly print: (line: string) => void = (line) => console.log(line)
  ) {}

  writeLine(line: string): void {
    const spinner = this.active?.isSpinning ? this.active : undefined;
    spinner?.clear();
    this.print(line);
    spinner?.render();
  }

  /**
   * Runs a step under a spinner, failing the spinner when the step throws
   */
  async run<T>(spinner: Spinner, step: () => Promise<T>): Promise<T> {
    this.active = spinner;
    try {
      return await step();
    } catch (error) {
      spinner.fail();
      throw error;
    } finally {
      this.active = undefined;
    }
  }
}
