// CHANGE: Leveled logger with DEBUG/INFO/WARN/ERROR output.
// WHY: Run summaries, per-package detail and excluded records need distinct levels.

import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

const levelWeight: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(levelWeight, value);
}

const envLevel = process.env.GATE_LOG_LEVEL ?? "info";
let activeLevel: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

const formatters: Record<LogLevel, (message: string) => string> = {
  debug: message => chalk.gray(`[DEBUG] ${message}`),
  info: message => chalk.blue(`[INFO] ${message}`),
  warn: message => chalk.yellow(`[WARN] ${message}`),
  error: message => chalk.red(`[ERROR] ${message}`)
};

function shouldLog(level: LogLevel): boolean {
  return levelWeight[level] >= levelWeight[activeLevel];
}

/**
 * Set log level for runtime diagnostics.
 *
 * @throws Error if level is not recognised.
 */
export function setLogLevel(level: string): void {
  if (!isLogLevel(level)) {
    throw new Error(`Unsupported log level: ${level}`);
  }
  activeLevel = level;
}

/**
 * Emit information-level log entry.
 *
 * Invariant: message must be a human-readable summary of a pipeline stage.
 */
export function info(message: string): void {
  if (shouldLog("info")) {
    console.error(formatters.info(message));
  }
}

export function debug(message: string): void {
  if (shouldLog("debug")) {
    console.error(formatters.debug(message));
  }
}

export function warn(message: string): void {
  if (shouldLog("warn")) {
    console.error(formatters.warn(message));
  }
}

export function error(message: string): void {
  if (shouldLog("error")) {
    console.error(formatters.error(message));
  }
}
