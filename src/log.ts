/**
 * Leveled stderr logger. stdout belongs to the terminal presenter.
 */

export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

export const LOG_LEVELS: readonly LogLevel[] = ["silent", "error", "warn", "info", "debug"];

const LEVEL_ORDER: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export function parseLogLevel(value?: string): LogLevel | null {
  if (!value) return null;
  const normalized = value.toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? null;
}

let currentLevel: LogLevel = parseLogLevel(process.env.RAYTRACE_LOG_LEVEL) ?? "info";
let sink: (line: string) => void = (line) => {
  process.stderr.write(line);
};

const shouldLog = (level: LogLevel) => LEVEL_ORDER[level] <= LEVEL_ORDER[currentLevel];

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/** Redirects output, e.g. while the presenter owns the terminal. Returns the previous sink. */
export function setLogSink(next: (line: string) => void): (line: string) => void {
  const previous = sink;
  sink = next;
  return previous;
}

export interface Logger {
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

export function createLogger(tag: string): Logger {
  const write = (level: Exclude<LogLevel, "silent">) => (message: string) => {
    if (shouldLog(level)) sink(`[${tag}] ${message}\n`);
  };

  return {
    error: write("error"),
    warn: write("warn"),
    info: write("info"),
    debug: write("debug"),
  };
}
