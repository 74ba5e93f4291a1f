// CHANGE: Level-filtered console logger shared by the crawl, resolver and persistence layers.
// WHY: Crawl progress goes to INFO, cache hits and HTTP details to DEBUG, skipped plugins to WARN.

import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

const levelWeight: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(levelWeight, value);
}

const envLevel = process.env.GENERATOR_LOG_LEVEL?.toLowerCase();
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
 * @param level - Desired logging level.
 * @throws Error if level is not recognised.
 */
export function setLogLevel(level: string): void {
  const normalised = level.toLowerCase();
  if (!isLogLevel(normalised)) {
    throw new Error(`Unsupported log level: ${level}`);
  }
  activeLevel = normalised;
}

/**
 * Emit information-level log entry.
 *
 * Invariant: message must be a human-readable summary of a pipeline stage.
 */
export function info(message: string): void {
  if (shouldLog("info")) {
    console.log(formatters.info(message));
  }
}

/**
 * Emit debug-level log entry for HTTP and cache details.
 */
export function debug(message: string): void {
  if (shouldLog("debug")) {
    console.log(formatters.debug(message));
  }
}

/**
 * Emit warning for conditions that skip work without failing the run.
 */
export function warn(message: string): void {
  if (shouldLog("warn")) {
    console.warn(formatters.warn(message));
  }
}

/**
 * Emit error-level log entry for failures that end the run.
 */
export function error(message: string): void {
  if (shouldLog("error")) {
    console.error(formatters.error(message));
  }
}
