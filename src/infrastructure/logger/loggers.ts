/**
 * Logger Implementations
 *
 * Provides different logging strategies for various use cases:
 * - ConsoleLogger: Standard console output (default for library use)
 * - StderrLogger: Everything on stderr, so stdout carries only results (for CLI)
 * - SilentLogger: No output (for quiet mode and tests)
 */

import type { Logger } from "../../domain/ports";

/**
 * Logger options
 */
export interface LoggerOptions {
  /** Show debug messages */
  verbose?: boolean;
}

/**
 * Standard console logger.
 * Default for library usage.
 */
export class ConsoleLogger implements Logger {
  private verbose: boolean;

  constructor(options?: LoggerOptions) {
    this.verbose = options?.verbose ?? false;
  }

  info(message: string): void {
    console.log(message);
  }

  warn(message: string): void {
    console.warn(message);
  }

  error(message: string): void {
    console.error(message);
  }

  debug(message: string): void {
    if (this.verbose) {
      console.log(message);
    }
  }
}

/**
 * CLI logger. stdout is reserved for project paths piped into a fuzzy
 * finder, so every diagnostic goes to stderr.
 */
export class StderrLogger implements Logger {
  private verbose: boolean;

  constructor(options?: LoggerOptions) {
    this.verbose = options?.verbose ?? false;
  }

  info(message: string): void {
    console.error(message);
  }

  warn(message: string): void {
    console.error(`warning: ${message}`);
  }

  error(message: string): void {
    console.error(`error: ${message}`);
  }

  debug(message: string): void {
    if (this.verbose) {
      console.error(`debug: ${message}`);
    }
  }
}

/**
 * Silent logger that produces no output.
 */
export class SilentLogger implements Logger {
  info(): void {}
  warn(): void {}
  error(): void {}
  debug(): void {}
}

/**
 * Create a standard console logger
 */
export function createLogger(options?: LoggerOptions): Logger {
  return new ConsoleLogger(options);
}

/**
 * Create a logger for the command line
 */
export function createStderrLogger(options?: LoggerOptions): Logger {
  return new StderrLogger(options);
}

/**
 * Create a silent logger
 */
export function createSilentLogger(): Logger {
  return new SilentLogger();
}
