/**
 * Error codes raised by the generator. Anything reaching the CLI boundary
 * results in exit code 1.
 */
export type ErrorCode =
  | "ConfigError"
  | "UpstreamStatusError"
  | "UnexpectedDownloadUrlError"
  | "TaskTimeoutError"
  | "RetryExhaustedError"
  | "TaskAbortedError"
  | "ExternalToolError"
  | "DatabaseFormatError"
  | "InvalidBuildNumberError"
  | "InvalidPluginIdError";

export interface AppErrorOptions {
  readonly cause?: unknown;
}

/**
 * Base class carrying a stable error code next to the message.
 */
export class AppError extends Error {
  public readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = this.constructor.name;
    this.code = code;
  }
}

export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super("ConfigError", message, options);
  }
}

/**
 * Upstream answered with a status that is neither success nor an expected absence.
 */
export class UpstreamStatusError extends AppError {
  public readonly status: number;
  public readonly url: string;

  constructor(url: string, status: number, context: string) {
    super("UpstreamStatusError", `${context}: ${url} answered with status ${status}`);
    this.status = status;
    this.url = url;
  }
}

export class UnexpectedDownloadUrlError extends AppError {
  constructor(url: string, expectedPrefix: string) {
    super("UnexpectedDownloadUrlError", `Download URL ${url} does not start with ${expectedPrefix}`);
  }
}

export class TaskTimeoutError extends AppError {
  constructor(label: string, timeoutMs: number) {
    super("TaskTimeoutError", `${label} timed out after ${timeoutMs}ms`);
  }
}

export class TaskAbortedError extends AppError {
  constructor(label: string) {
    super("TaskAbortedError", `${label} aborted`);
  }
}

/**
 * Every attempt of a supervised task failed; `cause` holds the last failure.
 */
export class RetryExhaustedError extends AppError {
  public readonly attempts: number;

  constructor(label: string, attempts: number, cause: unknown) {
    super("RetryExhaustedError", `${label} failed after ${attempts} attempts: ${describeError(cause)}`, { cause });
    this.attempts = attempts;
  }
}

export class ExternalToolError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super("ExternalToolError", message, options);
  }
}

export class DatabaseFormatError extends AppError {
  public readonly file: string;

  constructor(file: string, reason: string, options: AppErrorOptions = {}) {
    super("DatabaseFormatError", `Malformed database file ${file}: ${reason}`, options);
    this.file = file;
  }
}

export class InvalidBuildNumberError extends AppError {
  constructor(value: string) {
    super("InvalidBuildNumberError", `Invalid build number: "${value}"`);
  }
}

export class InvalidPluginIdError extends AppError {
  constructor(pluginId: string, reason: string) {
    super("InvalidPluginIdError", `Invalid plugin id "${pluginId}": ${reason}`);
  }
}

/**
 * Render any thrown value as a single-line message for logs.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
