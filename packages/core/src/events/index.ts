export {
  FULFILLMENT_EVENTS,
  ORDER_EVENTS,
  type FulfillmentEventType,
  type OrderEventType,
} from "./names.js";
export {
  EventEnvelopeSchema,
  OrderReservedPayloadSchema,
  AllocationFailureReasonSchema,
  AllocationFailedPayloadSchema,
  ReservationLifecyclePayloadSchema,
  OrderLineSchema,
  OrderPlacedPayloadSchema,
  OrderCancelledPayloadSchema,
  PaymentConfirmedPayloadSchema,
  type EventEnvelope,
  type OrderReservedPayload,
  type AllocationFailedPayload,
  type ReservationLifecyclePayload,
  type OrderPlacedPayload,
  type OrderCancelledPayload,
  type PaymentConfirmedPayload,
} from "./schemas.js";
export {
  createRecordingPublisher,
  type EventPublisher,
  type RecordingPublisher,
} from "./publisher.js";
