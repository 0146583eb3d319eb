/**
 * Logger types
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Structured fields appended to a log line as JSON */
export type LogMeta = Record<string, unknown>;

/**
 * Shape returned by withContext (@/logger)
 */
export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}
