/**
 * Logger type definitions
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Stream that debug and info lines go to; warn and error always use stderr
 */
export type LogDestination = "stdout" | "stderr";

export type LogMeta = Record<string, unknown>;

/**
 * Logger interface for structured logging
 *
 * Matches the signature of the project logger module (@/logger), so a
 * context-bound logger and the module itself are interchangeable.
 */
export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}
