/**
 * Error taxonomy for outbound calls.
 *
 * | Error | Retried | Counted by circuit |
 * |-------|---------|--------------------|
 * | `TimeoutError` | yes | yes |
 * | `TransientError` | yes | yes |
 * | socket errors (`ECONNRESET`, ...) | yes | yes |
 * | `CircuitOpenError` | no | no (never reached the network) |
 * | `ExhaustedRetriesError` | no | n/a (wraps the last transient error) |
 * | `OperationCancelledError` | no | no |
 * | anything else | no | no (business/validation outcome) |
 */

import { FulfillmentError } from "./FulfillmentError.js";

export class TimeoutError extends FulfillmentError<"OPERATION_TIMEOUT"> {
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super("OPERATION_TIMEOUT", `${operation} timed out after ${timeoutMs}ms`, {
      operation,
      timeoutMs,
    });
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Raised by collaborator clients for failures that are expected to succeed on
 * retry (e.g. HTTP 502/503/504).
 */
export class TransientError extends FulfillmentError<"TRANSIENT_FAILURE"> {
  constructor(message: string, options?: ErrorOptions) {
    super("TRANSIENT_FAILURE", message, undefined, options);
    this.name = "TransientError";
  }
}

export class CircuitOpenError extends FulfillmentError<"CIRCUIT_OPEN"> {
  readonly target: string;
  readonly retryAfterMs: number;

  constructor(target: string, retryAfterMs: number) {
    super("CIRCUIT_OPEN", `Circuit breaker '${target}' is open. Retry after ${retryAfterMs}ms.`, {
      target,
      retryAfterMs,
    });
    this.name = "CircuitOpenError";
    this.target = target;
    this.retryAfterMs = retryAfterMs;
  }
}

export class ExhaustedRetriesError extends FulfillmentError<"RETRIES_EXHAUSTED"> {
  readonly attempts: number;
  readonly lastError: unknown;

  constructor(target: string, attempts: number, lastError: unknown) {
    super(
      "RETRIES_EXHAUSTED",
      `'${target}' failed after ${attempts} attempts: ${describeError(lastError)}`,
      { target, attempts },
      { cause: lastError }
    );
    this.name = "ExhaustedRetriesError";
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export class OperationCancelledError extends FulfillmentError<"OPERATION_CANCELLED"> {
  constructor(operation: string) {
    super("OPERATION_CANCELLED", `${operation} was cancelled`, { operation });
    this.name = "OperationCancelledError";
  }
}

/**
 * Socket-level error codes surfaced by Node and undici.
 */
export const TRANSIENT_ERROR_CODES: ReadonlySet<string> = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "ETIMEDOUT",
  "EPIPE",
  "EAI_AGAIN",
  "ENETUNREACH",
  "EHOSTUNREACH",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_SOCKET",
]);

function readErrorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    return typeof error.code === "string" ? error.code : undefined;
  }
  return undefined;
}

/**
 * Classify an error as transient (worth retrying) or definitive.
 *
 * `fetch` wraps socket failures in a `TypeError` whose `cause` holds the
 * coded error, so causes are inspected as well.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof TimeoutError || error instanceof TransientError) {
    return true;
  }
  if (error instanceof FulfillmentError) {
    return false;
  }
  const code = readErrorCode(error);
  if (code !== undefined && TRANSIENT_ERROR_CODES.has(code)) {
    return true;
  }
  if (error instanceof Error && error.cause !== undefined && error.cause !== error) {
    return isTransientError(error.cause);
  }
  return false;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
