/**
 * Scoped console logger.
 *
 * Debug output is only written while `debug` is enabled in the config;
 * warnings are always written.
 */

import { config } from "./config.js";

export type LogLevel = "debug" | "warn";

export type LogWriter = (level: LogLevel, line: string) => void;

export interface Logger {
  readonly scope: string;
  debug(message: string): void;
  warn(message: string, error?: unknown): void;
}

const consoleWriter: LogWriter = (level, line) => {
  if (level === "warn") console.warn(line);
  else console.debug(line);
};

let writer: LogWriter = consoleWriter;

/**
 * Replace the writer used by every logger. Returns a function restoring
 * the previous one.
 */
export function setLogWriter(next: LogWriter): () => void {
  const previous = writer;
  writer = next;
  return () => {
    writer = previous;
  };
}

function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function createLogger(scope: string): Logger {
  const prefix = `[marklet:${scope}]`;
  return {
    scope,
    debug(message) {
      if (!config.getBoolean("debug")) return;
      writer("debug", `${prefix} ${message}`);
    },
    warn(message, error) {
      const suffix = error === undefined ? "" : `: ${describeError(error)}`;
      writer("warn", `${prefix} ${message}${suffix}`);
    },
  };
}
