/**
 * Domain event types published and consumed by the fulfillment service.
 */

export const FULFILLMENT_EVENTS = {
  ORDER_RESERVED: "order.reserved",
  ALLOCATION_FAILED: "order.allocation_failed",
  RESERVATION_EXPIRED: "order.reservation_expired",
  RESERVATION_RELEASED: "order.reservation_released",
  RESERVATION_CONFIRMED: "order.reservation_confirmed",
} as const;

export type FulfillmentEventType = (typeof FULFILLMENT_EVENTS)[keyof typeof FULFILLMENT_EVENTS];

/**
 * Events from the order service that drive allocation.
 */
export const ORDER_EVENTS = {
  ORDER_PLACED: "order.placed",
  ORDER_CANCELLED: "order.cancelled",
  PAYMENT_CONFIRMED: "order.payment_confirmed",
} as const;

export type OrderEventType = (typeof ORDER_EVENTS)[keyof typeof ORDER_EVENTS];
