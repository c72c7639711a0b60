/**
 * Logging Module
 *
 * @example
 * ```typescript
 * import { createScopedLogger, createNoOpLogger, type LogLevel } from "@orderflow/core";
 *
 * const level: LogLevel = "INFO";
 * const brokerLogger = createScopedLogger("Broker", level);
 * const silent = createNoOpLogger();
 * ```
 */

export type { Logger, LogLevel } from "./types.js";
export { LOG_LEVEL_PRIORITY, LOG_LEVELS, DEFAULT_LOG_LEVEL, shouldLog, isLogLevel } from "./types.js";

export { createScopedLogger, createNoOpLogger, createChildLogger, TRACE_TIMING } from "./scoped.js";
export type { TraceTiming } from "./scoped.js";

export type { LogCall, MockLogger } from "./testing.js";
export { createMockLogger } from "./testing.js";
