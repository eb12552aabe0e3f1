import chalk from 'chalk';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ConsoleLoggerOptions {
  verbose?: boolean;
  write?: (line: string) => void;
  now?: () => Date;
}

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

export function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Timestamped, coloured console output. Debug lines only appear in verbose mode.
 */
export class ConsoleLogger implements Logger {
  private readonly verbose: boolean;
  private readonly write: (line: string) => void;
  private readonly now: () => Date;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.write = options.write ?? ((line) => console.log(line));
    this.now = options.now ?? (() => new Date());
  }

  debug(message: string): void {
    if (this.verbose) {
      this.emit(chalk.gray, message);
    }
  }

  info(message: string): void {
    this.emit(chalk.blue, message);
  }

  success(message: string): void {
    this.emit(chalk.green, message);
  }

  warn(message: string): void {
    this.emit(chalk.yellow, `⚠️  ${message}`);
  }

  error(message: string): void {
    this.emit(chalk.red, `❌ ${message}`);
  }

  private emit(colour: (text: string) => string, message: string): void {
    this.write(`${chalk.gray(`[${formatTimestamp(this.now())}]`)} ${colour(message)}`);
  }
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  success: () => undefined,
  warn: () => undefined,
  error: () => undefined
};
