import chalk from 'chalk';

export enum LogLevel {
  TRACE = 0,
  DEBUG = 1,
  INFO = 2,
  WARN = 3,
  ERROR = 4,
  SILENT = 5,
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  trace: LogLevel.TRACE,
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

/**
 * Parse a level name such as "debug" or "trace". Unknown names yield undefined.
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  return LEVEL_NAMES[name.trim().toLowerCase()];
}

class Logger {
  private level: LogLevel = LogLevel.INFO;

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /** Raw protocol traffic. Goes to stderr so stdout stays scriptable. */
  trace(...args: unknown[]): void {
    if (this.level <= LogLevel.TRACE) {
      console.error(chalk.gray('[TRACE]'), ...args);
    }
  }

  debug(...args: unknown[]): void {
    if (this.level <= LogLevel.DEBUG) {
      console.error(chalk.dim('[DEBUG]'), ...args);
    }
  }

  info(...args: unknown[]): void {
    if (this.level <= LogLevel.INFO) {
      console.log(chalk.blue('[INFO]'), ...args);
    }
  }

  warn(...args: unknown[]): void {
    if (this.level <= LogLevel.WARN) {
      console.warn(chalk.yellow('[WARN]'), ...args);
    }
  }

  error(...args: unknown[]): void {
    if (this.level <= LogLevel.ERROR) {
      console.error(chalk.red('[ERROR]'), ...args);
    }
  }
}

export const logger = new Logger();

// STEAM_AUTH_LOG takes a level name; DEBUG alone turns on debug output
const envLevel = process.env.STEAM_AUTH_LOG ? parseLogLevel(process.env.STEAM_AUTH_LOG) : undefined;
if (envLevel !== undefined) {
  logger.setLevel(envLevel);
} else if (process.env.DEBUG) {
  logger.setLevel(LogLevel.DEBUG);
}
