/**
 * Leveled console logger
 */

import chalk from 'chalk';
import type { LogLevel } from '../core/types.js';

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

class Logger {
  private level: LogLevel = 'info';
  private quiet = false;
  private stderr = false;

  setLevel(level: LogLevel) {
    this.level = level;
  }

  /**
   * Quiet mode silences everything below error
   */
  setQuiet(quiet: boolean) {
    this.quiet = quiet;
  }

  /**
   * Send every line to stderr, leaving stdout to machine-readable output
   */
  setStderr(stderr: boolean) {
    this.stderr = stderr;
  }

  private print(line: string, args: unknown[]) {
    if (this.stderr) {
      console.error(line, ...args);
    } else {
      console.log(line, ...args);
    }
  }

  private shouldLog(level: LogLevel): boolean {
    if (this.quiet && level !== 'error') {
      return false;
    }
    return LEVELS[level] >= LEVELS[this.level];
  }

  debug(message: string, ...args: unknown[]) {
    if (this.shouldLog('debug')) {
      this.print(chalk.gray(`[DEBUG] ${message}`), args);
    }
  }

  info(message: string, ...args: unknown[]) {
    if (this.shouldLog('info')) {
      this.print(chalk.blue(`[INFO] ${message}`), args);
    }
  }

  warn(message: string, ...args: unknown[]) {
    if (this.shouldLog('warn')) {
      console.warn(chalk.yellow(`[WARN] ${message}`), ...args);
    }
  }

  error(message: string, ...args: unknown[]) {
    if (this.shouldLog('error')) {
      console.error(chalk.red(`[ERROR] ${message}`), ...args);
    }
  }

  success(message: string, ...args: unknown[]) {
    if (this.shouldLog('info')) {
      this.print(chalk.green(`[✓] ${message}`), args);
    }
  }

  /**
   * Phase heading, e.g. "Step 2/4  Probing ports..."
   */
  step(index: number, total: number, message: string) {
    if (this.shouldLog('info')) {
      this.print(chalk.cyan.bold(`\nStep ${index}/${total}`) + chalk.cyan(`  ${message}`), []);
    }
  }

  progress(message: string, current: number, total: number) {
    if (this.shouldLog('info') && total > 0) {
      const percentage = Math.round((current / total) * 100);
      this.print(chalk.cyan(`[${percentage}%] ${message} (${current}/${total})`), []);
    }
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
