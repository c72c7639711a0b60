/**
 * ## Scoped Loggers
 *
 * Factory for component loggers with scope prefixes and level filtering.
 *
 * - Prefixes all messages with `[scope]`
 * - Filters messages below the configured level
 * - Maps each level to the matching console method
 *
 * @example
 * ```typescript
 * const logger = createScopedLogger("Broker", "INFO");
 *
 * logger.debug("Suppressed");                     // Not logged
 * logger.warn("Buffering event", { pending: 3 }); // [Broker] Buffering event {"pending":3}
 * ```
 */

import type { UnknownRecord } from "../types.js";
import type { Logger, LogLevel } from "./types.js";
import { DEFAULT_LOG_LEVEL, shouldLog } from "./types.js";

interface RuntimeConsole {
  log: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
  time: (label: string) => void;
  timeEnd: (label: string) => void;
}

/**
 * Resolve the console on every call so tests can replace
 * `globalThis.console` after this module is imported.
 */
function getRuntimeConsole(): RuntimeConsole {
  return globalThis.console;
}

/**
 * Constants for trace timing operations.
 * Use with the `timing` field in trace log data.
 */
export const TRACE_TIMING = {
  START: "start",
  END: "end",
} as const;
export type TraceTiming = (typeof TRACE_TIMING)[keyof typeof TRACE_TIMING];

/**
 * Create a scoped logger with level filtering.
 *
 * @param scope - Prefix for log messages (e.g., "Resilience:inventory")
 * @param level - Minimum log level to emit (default: INFO)
 */
export function createScopedLogger(scope: string, level: LogLevel = DEFAULT_LOG_LEVEL): Logger {
  const prefix = `[${scope}]`;

  const formatMessage = (message: string, data?: UnknownRecord): string => {
    if (data && Object.keys(data).length > 0) {
      return `${prefix} ${message} ${JSON.stringify(data)}`;
    }
    return `${prefix} ${message}`;
  };

  return {
    debug(message: string, data?: UnknownRecord): void {
      if (shouldLog("DEBUG", level)) {
        getRuntimeConsole().debug(formatMessage(message, data));
      }
    },

    trace(message: string, data?: UnknownRecord): void {
      if (shouldLog("TRACE", level)) {
        const timing = data?.["timing"];
        if (timing === TRACE_TIMING.START) {
          getRuntimeConsole().time(`${prefix} ${message}`);
        } else if (timing === TRACE_TIMING.END) {
          getRuntimeConsole().timeEnd(`${prefix} ${message}`);
        } else {
          getRuntimeConsole().debug(formatMessage(message, data));
        }
      }
    },

    info(message: string, data?: UnknownRecord): void {
      if (shouldLog("INFO", level)) {
        getRuntimeConsole().info(formatMessage(message, data));
      }
    },

    report(message: string, data?: UnknownRecord): void {
      if (shouldLog("REPORT", level)) {
        // REPORT emits one JSON line for log aggregation
        getRuntimeConsole().log(
          JSON.stringify({
            scope,
            message,
            ...data,
            timestamp: Date.now(),
          })
        );
      }
    },

    warn(message: string, data?: UnknownRecord): void {
      if (shouldLog("WARN", level)) {
        getRuntimeConsole().warn(formatMessage(message, data));
      }
    },

    error(message: string, data?: UnknownRecord): void {
      if (shouldLog("ERROR", level)) {
        getRuntimeConsole().error(formatMessage(message, data));
      }
    },
  };
}

/**
 * Create a logger that discards everything.
 *
 * Components fall back to this when no logger is injected:
 *
 * ```typescript
 * this.logger = options.logger ?? createNoOpLogger();
 * ```
 */
export function createNoOpLogger(): Logger {
  return {
    debug: () => {},
    trace: () => {},
    info: () => {},
    report: () => {},
    warn: () => {},
    error: () => {},
  };
}

/**
 * Create a child logger whose scope is `parent:child`.
 *
 * @example
 * ```typescript
 * const inventoryLogger = createChildLogger("Resilience", "inventory", "DEBUG");
 * // Logs as [Resilience:inventory]
 * ```
 */
export function createChildLogger(
  parentScope: string,
  childScope: string,
  level: LogLevel = DEFAULT_LOG_LEVEL
): Logger {
  return createScopedLogger(`${parentScope}:${childScope}`, level);
}
