/**
 * termpost shared utilities
 *
 * Cross-cutting utilities used by the core and CLI packages.
 */

export const VERSION = "0.1.0";

// Logger
export {
  createLogger,
  silentLogger,
  type LogLevel,
  type Logger,
  type LoggerOptions,
} from "./logger";
