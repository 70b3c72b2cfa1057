/**
 * Logging utility with levels and colors.
 * Everything goes to stderr so formatted results on stdout stay pipeable.
 */

import chalk from 'chalk';
import type { LogLevel } from '../core/types.js';

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

type Sink = (line: string) => void;

/**
 * Logger class with configurable levels
 */
export class Logger {
  private level: LogLevel = 'info';
  private quiet = false;
  private sink: Sink;

  constructor(sink: Sink = (line) => process.stderr.write(`${line}\n`)) {
    this.sink = sink;
  }

  setLevel(level: LogLevel) {
    this.level = level;
  }

  setQuiet(quiet: boolean) {
    this.quiet = quiet;
  }

  /**
   * Errors are printed even in quiet mode
   */
  private shouldLog(level: LogLevel): boolean {
    if (this.quiet && level !== 'error') {
      return false;
    }
    return LEVELS[level] >= LEVELS[this.level];
  }

  private write(text: string, args: unknown[]) {
    const extra = args.map((arg) => (arg instanceof Error ? arg.message : String(arg)));
    this.sink([text, ...extra].join(' '));
  }

  debug(message: string, ...args: unknown[]) {
    if (this.shouldLog('debug')) {
      this.write(chalk.gray(`[DEBUG] ${message}`), args);
    }
  }

  info(message: string, ...args: unknown[]) {
    if (this.shouldLog('info')) {
      this.write(chalk.blue(`[INFO] ${message}`), args);
    }
  }

  warn(message: string, ...args: unknown[]) {
    if (this.shouldLog('warn')) {
      this.write(chalk.yellow(`[WARN] ${message}`), args);
    }
  }

  error(message: string, ...args: unknown[]) {
    if (this.shouldLog('error')) {
      this.write(chalk.red(`[ERROR] ${message}`), args);
    }
  }

  /**
   * Discovery line (info level)
   */
  success(message: string, ...args: unknown[]) {
    if (this.shouldLog('info')) {
      this.write(chalk.green(`[+] ${message}`), args);
    }
  }

  /**
   * Progress line (info level); total is optional because candidates are pulled lazily
   */
  progress(message: string, current: number, total?: number) {
    if (!this.shouldLog('info')) {
      return;
    }
    if (total && total > 0) {
      const percentage = Math.round((current / total) * 100);
      this.write(chalk.cyan(`[${percentage}%] ${message} (${current}/${total})`), []);
    } else {
      this.write(chalk.cyan(`[*] ${message} (${current})`), []);
    }
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
