/**
 * Zod schemas for the event envelope and every event payload.
 *
 * Inbound payloads are validated before they reach the coordinator; outbound
 * payloads are typed from the same schemas.
 */

import { z } from "zod";
import { SELECTION_CRITERIA } from "../selection/types.js";

// ============================================================================
// Envelope
// ============================================================================

export const EventEnvelopeSchema = z.object({
  id: z.string().min(1),
  eventType: z.string().min(1),
  payload: z.record(z.unknown()),
  /** ISO-8601 */
  occurredAt: z.string().min(1),
  source: z.string().min(1),
});

export type EventEnvelope = z.infer<typeof EventEnvelopeSchema>;

// ============================================================================
// Outbound
// ============================================================================

const fulfillmentEventBase = z.object({
  orderId: z.string().min(1),
  vendorId: z.string().optional(),
  reservationId: z.string().optional(),
  /** ISO-8601 */
  timestamp: z.string(),
});

export const OrderReservedPayloadSchema = fulfillmentEventBase.extend({
  vendorId: z.string(),
  reservationId: z.string(),
  locationId: z.string(),
  expiresAt: z.string(),
});

export const AllocationFailureReasonSchema = z.object({
  vendorId: z.string(),
  locationId: z.string(),
  kind: z.enum(["rejected", "unavailable", "circuit-open", "error"]),
  detail: z.string(),
});

export const AllocationFailedPayloadSchema = fulfillmentEventBase.extend({
  code: z.string(),
  reasons: z.array(AllocationFailureReasonSchema),
});

export const ReservationLifecyclePayloadSchema = fulfillmentEventBase.extend({
  vendorId: z.string(),
  reservationId: z.string(),
});

export type OrderReservedPayload = z.infer<typeof OrderReservedPayloadSchema>;
export type AllocationFailedPayload = z.infer<typeof AllocationFailedPayloadSchema>;
export type ReservationLifecyclePayload = z.infer<typeof ReservationLifecyclePayloadSchema>;

// ============================================================================
// Inbound
// ============================================================================

export const OrderLineSchema = z.object({
  productId: z.string().min(1),
  size: z.string().min(1),
  quantity: z.number().int().positive(),
});

export const OrderPlacedPayloadSchema = z.object({
  orderId: z.string().min(1),
  lines: z.array(OrderLineSchema).min(1),
  delivery: z.object({
    latitude: z.number().min(-90).max(90),
    longitude: z.number().min(-180).max(180),
  }),
  urgent: z.boolean().default(false),
  criterion: z.enum(SELECTION_CRITERIA).optional(),
});

export const OrderCancelledPayloadSchema = z.object({
  orderId: z.string().min(1),
  reason: z.string().optional(),
});

export const PaymentConfirmedPayloadSchema = z.object({
  orderId: z.string().min(1),
  reservationId: z.string().optional(),
});

export type OrderPlacedPayload = z.infer<typeof OrderPlacedPayloadSchema>;
export type OrderCancelledPayload = z.infer<typeof OrderCancelledPayloadSchema>;
export type PaymentConfirmedPayload = z.infer<typeof PaymentConfirmedPayloadSchema>;
