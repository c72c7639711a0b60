/**
 * Order as seen by the fulfillment core. Only the fields vendor selection
 * and reservation need.
 */

import type { SelectionCriterion } from "./selection/types.js";

export interface OrderLine {
  productId: string;
  size: string;
  quantity: number;
}

export interface DeliveryLocation {
  latitude: number;
  longitude: number;
}

export interface FulfillmentOrder {
  orderId: string;
  lines: readonly OrderLine[];
  delivery: DeliveryLocation;
  urgent: boolean;
  /** Omitted: urgent orders go fastest-delivery, others balanced */
  criterion?: SelectionCriterion | undefined;
}

export function resolveCriterion(order: FulfillmentOrder): SelectionCriterion {
  if (order.criterion !== undefined) {
    return order.criterion;
  }
  return order.urgent ? "fastest-delivery" : "balanced";
}

/**
 * Units a single vendor location must supply to serve the whole order.
 */
export function requiredQuantity(order: FulfillmentOrder): number {
  return order.lines.reduce((sum, line) => sum + line.quantity, 0);
}
