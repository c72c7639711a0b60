export {
  calculateBackoff,
  createBackoffCalculator,
  defaultJitter,
  noJitter,
  BACKOFF_DEFAULTS,
  type BackoffOptions,
} from "./backoff.js";
export { sleep, withTimeout, type TimeoutOptions } from "./timeout.js";
export {
  withRetry,
  RETRY_DEFAULTS,
  type RetrySettings,
  type RetryOptions,
  type RetryAttemptInfo,
} from "./retry.js";
export {
  CircuitBreaker,
  CIRCUIT_DEFAULTS,
  type CircuitBreakerSettings,
  type CircuitBreakerOptions,
  type CircuitSnapshot,
  type CircuitStateChange,
  type CircuitStateListener,
  type CircuitPermit,
} from "./circuit-breaker.js";
export {
  ResilienceWrapper,
  DEFAULT_CALL_TIMEOUT_MS,
  type ResilienceOptions,
  type ExecuteOptions,
} from "./wrapper.js";
