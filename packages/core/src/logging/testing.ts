/**
 * Testing utilities for logging.
 *
 * @example
 * ```typescript
 * const logger = createMockLogger();
 * const client = new ResilientBrokerClient({ transport, logger });
 *
 * await client.publish("order.reserved", payload);
 *
 * expect(logger.hasLoggedAt("WARN", "Broker unavailable, buffering event")).toBe(true);
 * ```
 */

import type { Logger, LogLevel } from "./types.js";
import type { UnknownRecord } from "../types.js";

export interface LogCall {
  level: LogLevel;
  message: string;
  /** Structured data (undefined if not provided) */
  data: UnknownRecord | undefined;
  timestamp: number;
}

/**
 * Logger that records every call for later assertion.
 */
export interface MockLogger extends Logger {
  readonly calls: ReadonlyArray<LogCall>;
  clear(): void;
  getCallsAtLevel(level: LogLevel): ReadonlyArray<LogCall>;
  /** Partial match on the message, any level */
  hasLoggedMessage(message: string): boolean;
  /** Partial match on the message at one level */
  hasLoggedAt(level: LogLevel, message: string): boolean;
  getLastCallAt(level: LogLevel): LogCall | undefined;
}

export function createMockLogger(): MockLogger {
  const calls: LogCall[] = [];

  const logMethod =
    (level: LogLevel) =>
    (message: string, data?: UnknownRecord): void => {
      calls.push({
        level,
        message,
        data,
        timestamp: Date.now(),
      });
    };

  return {
    get calls(): ReadonlyArray<LogCall> {
      return calls;
    },

    clear(): void {
      calls.length = 0;
    },

    getCallsAtLevel(level: LogLevel): ReadonlyArray<LogCall> {
      return calls.filter((call) => call.level === level);
    },

    hasLoggedMessage(message: string): boolean {
      return calls.some((call) => call.message.includes(message));
    },

    hasLoggedAt(level: LogLevel, message: string): boolean {
      return calls.some((call) => call.level === level && call.message.includes(message));
    },

    getLastCallAt(level: LogLevel): LogCall | undefined {
      const levelCalls = calls.filter((call) => call.level === level);
      return levelCalls[levelCalls.length - 1];
    },

    debug: logMethod("DEBUG"),
    trace: logMethod("TRACE"),
    info: logMethod("INFO"),
    report: logMethod("REPORT"),
    warn: logMethod("WARN"),
    error: logMethod("ERROR"),
  };
}
