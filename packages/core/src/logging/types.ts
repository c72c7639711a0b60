/**
 * Logging Types
 *
 * Defines the Logger interface and the six-level LogLevel hierarchy shared by
 * the broker client, the resilience wrapper, the reservation coordinator and
 * the hosting service.
 *
 * Log levels (most to least verbose):
 * - DEBUG: connection attempts, buffer internals
 * - TRACE: performance timing (console.time/timeEnd)
 * - INFO: allocation started/completed, broker connected
 * - REPORT: aggregated figures (sweep summaries, drain results)
 * - WARN: degraded state, buffering, circuit open
 * - ERROR: dropped events, exhausted reconnects, failed releases
 */

import type { UnknownRecord } from "../types.js";

export type LogLevel = "DEBUG" | "TRACE" | "INFO" | "REPORT" | "WARN" | "ERROR";

/**
 * Priority mapping for log levels.
 * Lower numbers are more verbose.
 */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  DEBUG: 0,
  TRACE: 1,
  INFO: 2,
  REPORT: 3,
  WARN: 4,
  ERROR: 5,
};

export const LOG_LEVELS = ["DEBUG", "TRACE", "INFO", "REPORT", "WARN", "ERROR"] as const;

export const DEFAULT_LOG_LEVEL: LogLevel = "INFO";

/**
 * Logger interface.
 *
 * Each method accepts a descriptive message and optional structured context.
 *
 * @example
 * ```typescript
 * const logger = createScopedLogger("Reservations", "DEBUG");
 *
 * logger.info("Allocation started", { orderId: "ord_1", candidates: 3 });
 * logger.warn("Circuit open, skipping candidate", { vendorId: "vendor-b" });
 * ```
 */
export interface Logger {
  debug(message: string, data?: UnknownRecord): void;
  trace(message: string, data?: UnknownRecord): void;
  info(message: string, data?: UnknownRecord): void;
  report(message: string, data?: UnknownRecord): void;
  warn(message: string, data?: UnknownRecord): void;
  error(message: string, data?: UnknownRecord): void;
}

/**
 * Check if a message at the given level should be logged.
 *
 * @example
 * ```typescript
 * shouldLog("DEBUG", "INFO"); // false
 * shouldLog("WARN", "INFO");  // true
 * ```
 */
export function shouldLog(messageLevel: LogLevel, configuredLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[messageLevel] >= LOG_LEVEL_PRIORITY[configuredLevel];
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}
