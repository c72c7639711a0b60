/**
 * ## Backoff Calculation
 *
 * Exponential backoff with multiplicative jitter, shared by the retry policy
 * and the broker client's reconnect loop.
 *
 * ```
 * delay = min(maxMs, round(initialMs * base^attempt * jitter))
 * ```
 *
 * `attempt` is 0-indexed: the delay before the first retry is attempt 0.
 *
 * @example
 * ```typescript
 * calculateBackoff(0, { initialMs: 200, base: 2, maxMs: 5000, jitterFn: noJitter }); // 200
 * calculateBackoff(3, { initialMs: 200, base: 2, maxMs: 5000, jitterFn: noJitter }); // 1600
 * calculateBackoff(6, { initialMs: 200, base: 2, maxMs: 5000, jitterFn: noJitter }); // 5000
 * ```
 */

export interface BackoffOptions {
  /** Delay for attempt 0 before jitter */
  initialMs: number;

  /** Growth factor per attempt */
  base: number;

  /** Upper bound applied after jitter */
  maxMs: number;

  /**
   * Multiplier source. Use `noJitter` for deterministic tests.
   *
   * @default defaultJitter
   */
  jitterFn?: (() => number) | undefined;
}

export const BACKOFF_DEFAULTS = {
  initialMs: 1_000,
  base: 2,
  maxMs: 60_000,
} as const;

/**
 * Random multiplier in [0.75, 1.25).
 */
export function defaultJitter(): number {
  return 0.75 + Math.random() * 0.5;
}

export function noJitter(): number {
  return 1.0;
}

export function calculateBackoff(attempt: number, options: BackoffOptions): number {
  const { initialMs, base, maxMs, jitterFn = defaultJitter } = options;

  if (!Number.isInteger(attempt) || attempt < 0) {
    throw new RangeError(`Invalid attempt number: ${attempt}. Must be an integer >= 0.`);
  }
  if (initialMs <= 0) {
    throw new RangeError(`Invalid initialMs: ${initialMs}. Must be > 0.`);
  }
  if (base < 1) {
    throw new RangeError(`Invalid base: ${base}. Must be >= 1.`);
  }
  if (maxMs < initialMs) {
    throw new RangeError(`Invalid maxMs: ${maxMs}. Must be >= initialMs (${initialMs}).`);
  }

  const jitter = jitterFn();
  if (!Number.isFinite(jitter) || jitter <= 0) {
    throw new RangeError(`Invalid jitter value: ${jitter}. Must be a finite number > 0.`);
  }

  return Math.min(maxMs, Math.round(initialMs * Math.pow(base, attempt) * jitter));
}

export function createBackoffCalculator(options: BackoffOptions): (attempt: number) => number {
  return (attempt: number) => calculateBackoff(attempt, options);
}
