import { cyan, dim, red, yellow, type StyleFn } from "./format/colors.js";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

const RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const LABEL: Record<LogLevel, StyleFn> = {
  debug: dim,
  info: cyan,
  warn: yellow,
  error: red,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function formatValue(value: unknown): string {
  if (value instanceof Error) {
    return JSON.stringify(value.message);
  }
  if (typeof value === "string") {
    return /[\s"=]/.test(value) ? JSON.stringify(value) : value;
  }
  return JSON.stringify(value) ?? String(value);
}

export function formatLine(level: LogLevel, message: string, fields?: LogFields): string {
  const parts = [level.toUpperCase().padEnd(5), message];
  if (fields) {
    for (const [key, value] of Object.entries(fields)) {
      if (value !== undefined) {
        parts.push(`${key}=${formatValue(value)}`);
      }
    }
  }
  return parts.join(" ");
}

/**
 * Line-oriented logger on stderr. Lines below `level` are dropped.
 */
export function createLogger(
  level: LogLevel = "info",
  write: (line: string) => void = (line) => console.error(line),
): Logger {
  const emit = (lineLevel: LogLevel, message: string, fields?: LogFields) => {
    if (RANK[lineLevel] < RANK[level]) {
      return;
    }
    const line = formatLine(lineLevel, message, fields);
    const label = line.slice(0, 5);
    write(`${dim(new Date().toISOString())} ${LABEL[lineLevel](label)}${line.slice(5)}`);
  };

  return {
    debug: (message, fields) => emit("debug", message, fields),
    info: (message, fields) => emit("info", message, fields),
    warn: (message, fields) => emit("warn", message, fields),
    error: (message, fields) => emit("error", message, fields),
  };
}
