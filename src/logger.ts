import pino, { type Logger } from "pino";

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// An invalid LOG_LEVEL is reported by loadConfig, not at import
const LOG_LEVEL = process.env["LOG_LEVEL"];

/**
 * Structured logger
 *
 * LOG_LEVEL controls verbosity (trace, debug, info, warn, error, fatal, silent).
 * Output is JSON on stderr with ISO timestamps and the level as a label;
 * stdout is left to command output.
 */
export const logger: Logger = pino(
  {
    name: "bounded-counter",
    level: isLogLevel(LOG_LEVEL) ? LOG_LEVEL : "info",
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.destination(2)
);

/**
 * Create a child logger with additional context
 */
export function createChildLogger(bindings: Record<string, unknown>): Logger {
  return logger.child(bindings);
}
