/**
 * Scoped diagnostic logger.
 * Writes timestamped lines to stderr, never stdout: stdout carries the
 * attached container's terminal.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

let threshold: LogLevel = "info";

/** Set the process-wide minimum level. Unknown values leave it unchanged. */
export function setLogLevel(level: string): void {
  if (isLogLevel(level)) {
    threshold = level;
  }
}

export function getLogLevel(): LogLevel {
  return threshold;
}

/**
 * Format a timestamp in ISO 8601 format.
 * Example: 2026-01-03T16:45:23.123Z
 */
function formatTimestamp(): string {
  return new Date().toISOString();
}

export interface LoggerOptions {
  /** Destination, defaults to process.stderr */
  write?: ((line: string) => void) | undefined;
}

/**
 * Create a logger whose lines are prefixed with `[agentpod:<scope>]`.
 * The level threshold is read on every call, so setLogLevel applies to
 * loggers created earlier.
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const write =
    options.write ??
    ((line: string) => {
      process.stderr.write(line);
    });

  const emit = (level: LogLevel, message: string): void => {
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(threshold)) {
      return;
    }
    write(`[${formatTimestamp()}] [agentpod:${scope}] ${level}: ${message}\n`);
  };

  return {
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    warn: (message) => emit("warn", message),
    error: (message) => emit("error", message),
  };
}

/** Message of an unknown thrown value */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
