import pino from "pino";
import type { Logger } from "pino";

export type { Logger };

export const LOG_LEVELS = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface CreateLoggerOptions {
  name?: string;
  level?: LogLevel;
}

/**
 * Create a pino logger writing to stderr.
 * stdout stays free for the MCP stdio transport and CLI output.
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  return pino(
    {
      name: options.name ?? "plugin-catalog",
      level: options.level ?? process.env.LOG_LEVEL ?? "info",
    },
    pino.destination(2)
  );
}

export const logger = createLogger();
