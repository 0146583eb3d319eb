/**
 * Console logger with LOG_LEVEL filtering
 *
 * Line format: `[ISO time] [LEVEL] message {json meta}`.
 */

import type { Logger, LogLevel, LogMeta } from "@/types";
import { LOG_LEVELS } from "@/constants/logger";

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVELS, value);
}

const configuredLevel = process.env.LOG_LEVEL?.toLowerCase();
const threshold = LOG_LEVELS[isLogLevel(configuredLevel) ? configuredLevel : "info"];

const sinks: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.log(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

/**
 * Serialize meta for the log line; "" when there is none
 *
 * Error values become { name, message }.
 */
export function formatMeta(meta?: LogMeta): string {
  if (!meta || Object.keys(meta).length === 0) {
    return "";
  }
  const json = JSON.stringify(meta, (_key, value: unknown) =>
    value instanceof Error ? { name: value.name, message: value.message } : value,
  );
  return ` ${json}`;
}

function log(level: LogLevel, message: string, meta?: LogMeta): void {
  if (LOG_LEVELS[level] < threshold) {
    return;
  }
  sinks[level](
    `[${new Date().toISOString()}] [${level.toUpperCase()}] ${message}${formatMeta(meta)}`,
  );
}

export function debug(message: string, meta?: LogMeta): void {
  log("debug", message, meta);
}

export function info(message: string, meta?: LogMeta): void {
  log("info", message, meta);
}

export function warn(message: string, meta?: LogMeta): void {
  log("warn", message, meta);
}

export function error(message: string, meta?: LogMeta): void {
  log("error", message, meta);
}

/**
 * Logger whose calls all carry `context` (call meta wins on key clashes)
 */
export function withContext(context: LogMeta): Logger {
  const bind =
    (level: LogLevel) =>
    (message: string, meta?: LogMeta): void =>
      log(level, message, { ...context, ...meta });

  return {
    debug: bind("debug"),
    info: bind("info"),
    warn: bind("warn"),
    error: bind("error"),
  };
}
