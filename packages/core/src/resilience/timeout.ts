/**
 * Timer helpers built on the global `setTimeout`, so `vi.useFakeTimers()`
 * drives them in tests.
 */

import { OperationCancelledError, TimeoutError } from "../errors/index.js";

/**
 * Resolve after `ms`. Rejects with `OperationCancelledError` when `signal`
 * aborts first.
 */
export function sleep(ms: number, signal?: AbortSignal, label = "sleep"): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new OperationCancelledError(label));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new OperationCancelledError(label));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export interface TimeoutOptions {
  timeoutMs: number;
  /** Operation name used in error messages */
  label: string;
  /** Caller cancellation */
  signal?: AbortSignal | undefined;
}

/**
 * Run `operation` under a deadline.
 *
 * The operation receives a signal that aborts when the deadline passes or the
 * caller's signal aborts. The returned promise settles as soon as either
 * happens, without waiting for the operation to notice.
 *
 * @throws TimeoutError when the deadline passes
 * @throws OperationCancelledError when the caller aborts
 */
export function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  options: TimeoutOptions
): Promise<T> {
  const { timeoutMs, label, signal } = options;

  return new Promise<T>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new OperationCancelledError(label));
      return;
    }

    const controller = new AbortController();
    let settled = false;

    const settle = (complete: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
      complete();
    };

    const onAbort = (): void => {
      const error = new OperationCancelledError(label);
      controller.abort(error);
      settle(() => reject(error));
    };

    const timer = setTimeout(() => {
      const error = new TimeoutError(label, timeoutMs);
      controller.abort(error);
      settle(() => reject(error));
    }, timeoutMs);

    signal?.addEventListener("abort", onAbort, { once: true });

    void Promise.resolve()
      .then(() => operation(controller.signal))
      .then(
        (value) => settle(() => resolve(value)),
        (error: unknown) => settle(() => reject(error))
      );
  });
}
