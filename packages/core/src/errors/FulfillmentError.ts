import type { UnknownRecord } from "../types.js";

/**
 * Base error class for the fulfillment core.
 *
 * Carries a machine-readable `code` and optional debugging `context`.
 * Each area (resilience, configuration, reservations) either subclasses it
 * or derives a typed variant through {@link FulfillmentError.forContext}.
 *
 * @example
 * ```typescript
 * const SelectionError = FulfillmentError.forContext<"INVALID_WEIGHTS">("Selection");
 *
 * throw new SelectionError("INVALID_WEIGHTS", "Weights must sum to a positive number", {
 *   weights,
 * });
 * ```
 */
export class FulfillmentError<TCode extends string = string> extends Error {
  public readonly code: TCode;

  public readonly context?: UnknownRecord;

  constructor(code: TCode, message: string, context?: UnknownRecord, options?: ErrorOptions) {
    super(message, options);
    this.code = code;
    // Only set context if provided (satisfies exactOptionalPropertyTypes)
    if (context !== undefined) {
      this.context = context;
    }
    this.name = "FulfillmentError";
  }

  /**
   * Factory for area-specific error subclasses that share this structure.
   */
  static forContext<TCode extends string>(
    contextName: string
  ): new (code: TCode, message: string, context?: UnknownRecord) => FulfillmentError<TCode> {
    const ContextError = class extends FulfillmentError<TCode> {
      constructor(code: TCode, message: string, context?: UnknownRecord) {
        super(code, message, context);
        this.name = `${contextName}Error`;
      }
    };

    Object.defineProperty(ContextError, "name", {
      value: `${contextName}Error`,
      configurable: true,
    });

    return ContextError;
  }

  static isFulfillmentError(error: unknown): error is FulfillmentError {
    return error instanceof FulfillmentError;
  }

  static hasCode<T extends string>(error: unknown, code: T): error is FulfillmentError<T> {
    return FulfillmentError.isFulfillmentError(error) && error.code === code;
  }
}
