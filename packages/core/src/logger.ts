// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Logger adapter interface for sessions, transports and the consumer launcher.
 *
 * Lets applications plug in their own logging (Winston, Pino, a structured
 * logging service) instead of the console.
 *
 * @example
 * ```typescript
 * import { createSession, createLogger } from "@bufcast/core";
 *
 * const session = await createSession({
 *   transport,
 *   logger: createLogger({ minLevel: "info" }),
 * });
 * ```
 */
export interface LoggerAdapter {
  /**
   * Log a debug-level message
   *
   * @param context - Category or source of the log (e.g., "session", "transport")
   * @param message - Log message
   * @param data - Optional structured data
   */
  debug(context: string, message: string, data?: unknown): void;

  info(context: string, message: string, data?: unknown): void;

  warn(context: string, message: string, data?: unknown): void;

  /**
   * Log an error-level message
   *
   * @param data - Optional structured data (error details, stack trace, etc.)
   */
  error(context: string, message: string, data?: unknown): void;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  /**
   * Custom log function. Replaces console output when provided.
   */
  log?: (
    level: LogLevel,
    context: string,
    message: string,
    data?: unknown,
  ) => void;

  /**
   * Minimum log level to output (default: "info")
   */
  minLevel?: LogLevel;
}

const LEVELS: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Create a logger adapter with level filtering
 */
export function createLogger(options: LoggerOptions = {}): LoggerAdapter {
  const minLevelValue = LEVELS[options.minLevel ?? "info"];

  const write = (
    level: LogLevel,
    context: string,
    message: string,
    data?: unknown,
  ): void => {
    if (LEVELS[level] < minLevelValue) {
      return;
    }
    if (options.log) {
      options.log(level, context, message, data);
      return;
    }
    const line = `[${context}] ${message}`;
    if (data === undefined) {
      console[level](line);
    } else {
      console[level](line, data);
    }
  };

  return {
    debug: (context, message, data) => write("debug", context, message, data),
    info: (context, message, data) => write("info", context, message, data),
    warn: (context, message, data) => write("warn", context, message, data),
    error: (context, message, data) => write("error", context, message, data),
  };
}

/**
 * Logger that drops everything. Default for sessions and transports: they
 * never log unless given a logger.
 */
export const silentLogger: LoggerAdapter = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

/**
 * Log context constants used by bufcast
 */
export const LOG_CONTEXT = {
  SESSION: "session",
  TRANSPORT: "transport",
  LAUNCHER: "launcher",
} as const;
