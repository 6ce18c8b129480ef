/**
 * Logging
 *
 * Loggers are always passed in explicitly. Nothing in the library reaches
 * for a process-wide instance.
 */

import { pino, type Level, type Logger } from "pino";
import { LOGGER_NAME } from "#/constants";

export type { Logger };

export type LogLevel = Level | "silent";

export interface LoggerOptions {
  level?: LogLevel;
}

/**
 * Create a logger for the library. Silent unless a level is given.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: LOGGER_NAME,
    level: options.level ?? "silent",
  });
}
