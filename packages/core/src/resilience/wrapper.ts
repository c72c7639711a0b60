/**
 * ## Resilience Wrapper
 *
 * Composes retry, circuit breaker and per-call timeout for calls to peer
 * services. Retry sits outside the breaker, so every attempt (including a
 * half-open trial) asks the breaker for a permit:
 *
 * ```
 * execute(target, op)
 *   └─ withRetry ─┬─ attempt 1 ─ breaker.execute ─ withTimeout(op)
 *                 ├─ attempt 2 ─ ...
 *                 └─ ExhaustedRetriesError
 * ```
 *
 * `CircuitOpenError` is not retryable, so an open circuit ends the call on
 * the spot.
 *
 * @example
 * ```typescript
 * const resilience = new ResilienceWrapper({ retry: { maxAttempts: 3 }, callTimeoutMs: 2_000 });
 *
 * const stock = await resilience.execute("inventory", (signal) => inventory.lookup(sku, signal));
 * ```
 */

import { isTransientError } from "../errors/index.js";
import { createNoOpLogger, type Logger } from "../logging/index.js";
import type { Clock } from "../types.js";
import {
  CircuitBreaker,
  type CircuitBreakerSettings,
  type CircuitSnapshot,
  type CircuitStateListener,
} from "./circuit-breaker.js";
import { RETRY_DEFAULTS, withRetry, type RetrySettings } from "./retry.js";
import { withTimeout } from "./timeout.js";

export const DEFAULT_CALL_TIMEOUT_MS = 30_000;

export interface ResilienceOptions {
  circuit?: Partial<CircuitBreakerSettings> | undefined;
  retry?: Partial<RetrySettings> | undefined;
  callTimeoutMs?: number | undefined;
  now?: Clock | undefined;
  /** Logger for a target; scoped as `Resilience:<target>` by the service */
  loggerFor?: ((target: string) => Logger) | undefined;
}

export interface ExecuteOptions {
  signal?: AbortSignal | undefined;
  /**
   * When `signal` aborts, let an attempt already in flight run to its own
   * end (answer or call timeout) and skip only the remaining retries. For
   * calls with side effects the caller must undo.
   */
  letAttemptFinish?: boolean | undefined;
}

export class ResilienceWrapper {
  private readonly circuitSettings: Partial<CircuitBreakerSettings>;
  private readonly retrySettings: RetrySettings;
  private readonly callTimeoutMs: number;
  private readonly now: Clock | undefined;
  private readonly loggerFor: (target: string) => Logger;
  private readonly breakers = new Map<string, CircuitBreaker>();
  private readonly listeners = new Set<CircuitStateListener>();

  constructor(options: ResilienceOptions = {}) {
    this.circuitSettings = options.circuit ?? {};
    this.retrySettings = { ...RETRY_DEFAULTS, ...options.retry };
    this.callTimeoutMs = options.callTimeoutMs ?? DEFAULT_CALL_TIMEOUT_MS;
    this.now = options.now;
    this.loggerFor = options.loggerFor ?? (() => createNoOpLogger());
  }

  /**
   * Call `operation` against `target` under the policy.
   *
   * @throws CircuitOpenError when the target's circuit refuses the call
   * @throws ExhaustedRetriesError when every attempt failed transiently
   * @throws OperationCancelledError when `options.signal` aborts (between
   * attempts only, under `letAttemptFinish`)
   * @throws the operation's own error when it is not transient
   */
  async execute<T>(
    target: string,
    operation: (signal: AbortSignal) => Promise<T>,
    options: ExecuteOptions = {}
  ): Promise<T> {
    const breaker = this.getCircuit(target);
    const logger = this.loggerFor(target);

    return withRetry(
      () =>
        breaker.execute(() =>
          withTimeout(operation, {
            timeoutMs: this.callTimeoutMs,
            label: target,
            signal: options.letAttemptFinish ? undefined : options.signal,
          })
        ),
      {
        ...this.retrySettings,
        label: target,
        isRetryable: isTransientError,
        signal: options.signal,
        onRetry: ({ attempt, delayMs, error }) => {
          logger.debug("Retrying after transient failure", {
            target,
            attempt,
            delayMs,
            error: error instanceof Error ? error.message : String(error),
          });
        },
      }
    );
  }

  /**
   * Breaker for `target`, created on first use.
   */
  getCircuit(target: string): CircuitBreaker {
    const existing = this.breakers.get(target);
    if (existing) {
      return existing;
    }

    const breaker = new CircuitBreaker(target, {
      ...this.circuitSettings,
      now: this.now,
      logger: this.loggerFor(target),
    });
    breaker.onStateChange((change) => {
      for (const listener of this.listeners) {
        listener(change);
      }
    });
    this.breakers.set(target, breaker);
    return breaker;
  }

  getCircuitSnapshots(): CircuitSnapshot[] {
    return [...this.breakers.values()].map((breaker) => breaker.snapshot());
  }

  onCircuitStateChange(listener: CircuitStateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  resetCircuit(target: string): void {
    this.breakers.get(target)?.reset();
  }
}
