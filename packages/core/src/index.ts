/**
 * @orderflow/core
 *
 * Fulfillment domain building blocks shared by the bus package and the
 * hosting service: logging, errors, state machines, the resilience wrapper,
 * vendor selection, stock reservation and health aggregation.
 */

export type { UnknownRecord, Clock } from "./types.js";
export { assertNever, systemClock } from "./types.js";
export { generateId, uuidv7 } from "./ids.js";

export * from "./logging/index.js";
export * from "./errors/index.js";
export * from "./fsm/index.js";
export * from "./resilience/index.js";
export * from "./selection/index.js";
export * from "./events/index.js";
export * from "./reservations/index.js";
export * from "./health/index.js";

export {
  resolveCriterion,
  requiredQuantity,
  type FulfillmentOrder,
  type OrderLine,
  type DeliveryLocation,
} from "./order.js";
