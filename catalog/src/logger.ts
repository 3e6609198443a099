/**
 * Shelfkeep Catalog -- Structured Logger
 *
 * Wraps pino for structured logging of catalog loads and mutations.
 * Silent by default so CLI users only see command output; at debug level
 * JSON lines go to stderr.
 *
 * pino.destination() is used instead of transports: transports spawn
 * worker threads and the CLI must exit as soon as a command returns.
 */

import pino from "pino";

export type LogLevel = "silent" | "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  level: LogLevel;
  /** File descriptor to write to (default: stderr) */
  fd: number;
}

const DEFAULT_OPTIONS: LoggerOptions = {
  level: "silent",
  fd: 2,
};

const LOG_LEVELS: readonly LogLevel[] = ["silent", "debug", "info", "warn", "error"];

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function createLogger(options: Partial<LoggerOptions> = {}): pino.Logger {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  return pino(
    {
      level: opts.level,
      formatters: {
        level(label: string) {
          return { level: label };
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ fd: opts.fd, sync: true }),
  );
}

export type Logger = pino.Logger;
