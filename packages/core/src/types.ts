/**
 * Core Type Aliases
 *
 * Shared type definitions used throughout the @orderflow/core package.
 */

/**
 * Alias for Record<string, unknown>.
 *
 * Used for event payloads, log context and error context where the
 * structure is not known at compile time.
 */
export type UnknownRecord = Record<string, unknown>;

/**
 * Exhaustiveness check helper for switch statements on discriminated unions.
 *
 * Use in the `default` case so that adding a variant to the union becomes a
 * compile-time error at every switch that forgot to handle it.
 *
 * @example
 * ```typescript
 * function describe(criterion: SelectionCriterion): string {
 *   switch (criterion) {
 *     case "lowest-price":
 *       return "cheapest first";
 *     // ...
 *     default:
 *       return assertNever(criterion);
 *   }
 * }
 * ```
 */
export function assertNever(x: never, message?: string): never {
  throw new Error(message ?? `Unexpected value: ${JSON.stringify(x)}`);
}

/**
 * Clock abstraction. Components take `now` as an option so tests can pin time
 * without touching the global clock.
 */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();
