/**
 * Warden Engine -- Structured Logger
 *
 * Wraps pino for structured logging of every engine step.
 *
 * Silent by default so CLI users only see the formatted console output.
 * With --debug/--verbose, JSON lines go to stderr.
 *
 * NOTE: pino.destination() is used instead of transports; transports
 * spawn worker_threads that do not survive bundling.
 */

import pino from "pino";

export type LogLevel = "silent" | "trace" | "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  level: LogLevel;
  /** Added as the `component` binding on every line */
  component?: string;
}

const DEFAULT_OPTIONS: LoggerOptions = {
  level: "silent",
};

export function createLogger(options: Partial<LoggerOptions> = {}): pino.Logger {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  const logger = pino(
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

  return opts.component ? logger.child({ component: opts.component }) : logger;
}

export type Logger = pino.Logger;
