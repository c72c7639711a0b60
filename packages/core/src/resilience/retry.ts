/**
 * ## Retry Policy
 *
 * Bounded retries with exponential backoff, applied only to errors the
 * classifier accepts (transient failures by default).
 *
 * ```
 * attempt 1 ──fail(transient)──► sleep(backoff(0)) ──► attempt 2 ──► ... ──► ExhaustedRetriesError
 *           └─fail(other)──────► rethrown unchanged
 * ```
 */

import {
  ExhaustedRetriesError,
  OperationCancelledError,
  isTransientError,
} from "../errors/index.js";
import { calculateBackoff, defaultJitter } from "./backoff.js";
import { sleep } from "./timeout.js";

export interface RetrySettings {
  /** Total attempts including the first */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterFn?: (() => number) | undefined;
}

export const RETRY_DEFAULTS: RetrySettings = {
  maxAttempts: 3,
  baseDelayMs: 200,
  maxDelayMs: 5_000,
};

export interface RetryAttemptInfo {
  /** 1-indexed attempt that just failed */
  attempt: number;
  delayMs: number;
  error: unknown;
}

export interface RetryOptions extends RetrySettings {
  /** Name used in `ExhaustedRetriesError` */
  label: string;
  isRetryable?: ((error: unknown) => boolean) | undefined;
  signal?: AbortSignal | undefined;
  onRetry?: ((info: RetryAttemptInfo) => void) | undefined;
}

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const {
    maxAttempts,
    baseDelayMs,
    maxDelayMs,
    jitterFn = defaultJitter,
    label,
    isRetryable = isTransientError,
    signal,
    onRetry,
  } = options;

  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new RangeError(`Invalid maxAttempts: ${maxAttempts}. Must be an integer >= 1.`);
  }

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (signal?.aborted) {
      throw new OperationCancelledError(label);
    }

    try {
      return await operation(attempt);
    } catch (error) {
      if (!isRetryable(error)) {
        throw error;
      }
      lastError = error;
    }

    if (attempt < maxAttempts) {
      const delayMs = calculateBackoff(attempt - 1, {
        initialMs: baseDelayMs,
        base: 2,
        maxMs: maxDelayMs,
        jitterFn,
      });
      onRetry?.({ attempt, delayMs, error: lastError });
      await sleep(delayMs, signal, label);
    }
  }

  throw new ExhaustedRetriesError(label, maxAttempts, lastError);
}
