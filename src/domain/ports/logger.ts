/**
 * Logger Port
 *
 * Abstract interface for diagnostic messages.
 * The domain reports what it skipped or could not do through this port
 * and never writes to the console itself.
 */

/**
 * Abstract logger interface.
 *
 * Implementations might:
 * - Log to console (ConsoleLogger)
 * - Log everything to stderr so stdout stays machine-readable (StderrLogger)
 * - Be silent (SilentLogger)
 */
export interface Logger {
  /**
   * Log an info message
   */
  info(message: string): void;

  /**
   * Log a warning message
   */
  warn(message: string): void;

  /**
   * Log an error message
   */
  error(message: string): void;

  /**
   * Log a debug message (only shown in verbose mode)
   */
  debug(message: string): void;
}

/**
 * Factory function type for creating loggers
 */
export type LoggerFactory = (options?: { verbose?: boolean }) => Logger;
