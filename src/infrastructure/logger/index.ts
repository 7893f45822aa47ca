/**
 * Logger Infrastructure
 *
 * Implements the Logger port with various logging strategies.
 */

export {
  ConsoleLogger,
  StderrLogger,
  SilentLogger,
  createLogger,
  createStderrLogger,
  createSilentLogger,
} from "./loggers";
export type { LoggerOptions } from "./loggers";
