/**
 * Cursor Installer Engine -- Structured Logger
 *
 * Wraps pino. Silent unless a level is requested (the CLI maps --debug to
 * "debug"), so regular runs only show the CLI's own output. Logs go to
 * stderr through a synchronous destination.
 */

import pino from "pino";

export type LogLevel = "silent" | "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  level: LogLevel;
}

const DEFAULT_OPTIONS: LoggerOptions = {
  level: "silent",
};

export function createLogger(
  options: Partial<LoggerOptions> = {},
): pino.Logger {
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
    pino.destination({ fd: 2, sync: true }),
  );
}

export function isLogLevel(value: string): value is LogLevel {
  return ["silent", "debug", "info", "warn", "error"].includes(value);
}

export type Logger = pino.Logger;
