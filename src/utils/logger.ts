import chalk from "chalk";

export type LineWriter = (line: string) => void;

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
}

/**
 * Timestamped console logger. Debug lines are dropped unless enabled.
 */
export class ConsoleLogger implements Logger {
  constructor(
    private readonly debugEnabled: boolean = false,
    private readonly write: LineWriter = (line) => console.log(line)
  ) {}

  debug(message: string): void {
    if (this.debugEnabled) {
      this.write(chalk.gray(`[DEBUG] ${timestamp()}: ${message}`));
    }
  }

  info(message: string): void {
    this.write(`${chalk.blue("[INFO]")} ${timestamp()}: ${message}`);
  }
}

/**
 * Logger that discards everything
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
};

function timestamp(): string {
  return new Date().toISOString();
}
