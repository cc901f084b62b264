import pino, { type Logger } from "pino";

export type { Logger };

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * JSON lines on stderr. Stdout carries the stdio transport and must stay clean.
 */
export function createLogger(level: LogLevel = "info"): Logger {
  return pino(
    {
      name: "editor-bridge",
      level,
      base: undefined,
      formatters: {
        level: (label) => ({ level: label }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination(2),
  );
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
