import { pino, type Logger } from "pino";
import pretty from "pino-pretty";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Pretty-printed pino logger on stdout. The stream is synchronous so a
 * finished run exits without waiting on a transport worker.
 */
export function createLogger(level: LogLevel = "info"): Logger {
  return pino(
    { base: undefined, level },
    pretty({ colorize: true, sync: true, translateTime: "SYS:HH:MM:ss" })
  );
}

export type { Logger };
