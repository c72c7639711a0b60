/**
 * ## Order Event Consumers
 *
 * Bridges inbound order events to the reservation coordinator.
 *
 * | Event | Action |
 * |-------|--------|
 * | `order.placed` | allocate stock (cancellable) |
 * | `order.cancelled` | abort an in-flight allocation, then release the order's hold |
 * | `order.payment_confirmed` | confirm the order's hold |
 *
 * Payloads that fail validation are logged and acknowledged; redelivering
 * them cannot help. Collaborator outages are rethrown so the broker
 * redelivers the message.
 */

import type { z } from "zod";
import {
  ORDER_EVENTS,
  OrderCancelledPayloadSchema,
  OrderPlacedPayloadSchema,
  PaymentConfirmedPayloadSchema,
  createNoOpLogger,
  type AllocationResult,
  type EventEnvelope,
  type FulfillmentOrder,
  type Logger,
  type StockReservationCoordinator,
} from "@orderflow/core";
import type { EventHandler } from "@orderflow/bus";

export type ReservationOperations = Pick<
  StockReservationCoordinator,
  "allocate" | "releaseForOrder" | "confirm" | "findActiveForOrder"
>;

export interface EventSubscriber {
  subscribe(eventType: string, handler: EventHandler): Promise<() => void>;
}

export interface OrderEventConsumersOptions {
  reservations: ReservationOperations;
  logger?: Logger | undefined;
}

interface InFlightAllocation {
  controller: AbortController;
  done: Promise<AllocationResult>;
}

export class OrderEventConsumers {
  private readonly reservations: ReservationOperations;
  private readonly logger: Logger;
  private readonly inFlight = new Map<string, InFlightAllocation>();

  constructor(options: OrderEventConsumersOptions) {
    this.reservations = options.reservations;
    this.logger = options.logger ?? createNoOpLogger();
  }

  /**
   * Subscribe every handler.
   *
   * @returns function removing all subscriptions
   */
  async register(bus: EventSubscriber): Promise<() => void> {
    const unsubscribers = [
      await bus.subscribe(ORDER_EVENTS.ORDER_PLACED, (envelope) => this.handleOrderPlaced(envelope)),
      await bus.subscribe(ORDER_EVENTS.ORDER_CANCELLED, (envelope) =>
        this.handleOrderCancelled(envelope)
      ),
      await bus.subscribe(ORDER_EVENTS.PAYMENT_CONFIRMED, (envelope) =>
        this.handlePaymentConfirmed(envelope)
      ),
    ];
    return () => {
      for (const unsubscribe of unsubscribers) unsubscribe();
    };
  }

  async handleOrderPlaced(envelope: EventEnvelope): Promise<void> {
    const payload = this.parse(envelope, OrderPlacedPayloadSchema);
    if (!payload) return;

    const order: FulfillmentOrder = {
      orderId: payload.orderId,
      lines: payload.lines,
      delivery: payload.delivery,
      urgent: payload.urgent,
      criterion: payload.criterion,
    };

    const controller = new AbortController();
    const done = this.reservations.allocate(order, { signal: controller.signal });
    this.inFlight.set(order.orderId, { controller, done });

    let result: AllocationResult;
    try {
      result = await done;
    } finally {
      if (this.inFlight.get(order.orderId)?.done === done) {
        this.inFlight.delete(order.orderId);
      }
    }

    switch (result.status) {
      case "reserved":
        this.logger.info("Order allocated", {
          orderId: order.orderId,
          reservationId: result.reservation.reservationId,
          vendorId: result.reservation.vendorId,
          reused: result.reused,
        });
        break;
      case "failed":
        this.logger.warn("Order could not be allocated", {
          orderId: order.orderId,
          code: result.code,
          reasons: result.reasons.length,
        });
        break;
      case "rejected":
        this.logger.warn("No vendor candidates for order", {
          orderId: order.orderId,
          reason: result.reason,
        });
        break;
      case "cancelled":
        this.logger.info("Allocation cancelled", { orderId: order.orderId });
        break;
    }
  }

  async handleOrderCancelled(envelope: EventEnvelope): Promise<void> {
    const payload = this.parse(envelope, OrderCancelledPayloadSchema);
    if (!payload) return;

    const pending = this.inFlight.get(payload.orderId);
    if (pending) {
      pending.controller.abort();
      // The placing handler reports the outcome; a hold accepted just before the abort is released below
      await pending.done.catch(() => undefined);
    }

    const result = await this.reservations.releaseForOrder(payload.orderId);
    switch (result.status) {
      case "released":
        this.logger.info("Released hold for cancelled order", {
          orderId: payload.orderId,
          reservationId: result.reservation.reservationId,
          changed: result.changed,
        });
        break;
      case "no-reservation":
        this.logger.debug("Cancelled order had no pending hold", { orderId: payload.orderId });
        break;
      case "error":
        this.logger.warn("Could not release hold for cancelled order", {
          orderId: payload.orderId,
          code: result.code,
          message: result.message,
        });
        break;
    }
  }

  async handlePaymentConfirmed(envelope: EventEnvelope): Promise<void> {
    const payload = this.parse(envelope, PaymentConfirmedPayloadSchema);
    if (!payload) return;

    let reservationId = payload.reservationId;
    if (reservationId === undefined) {
      const active = await this.reservations.findActiveForOrder(payload.orderId);
      if (!active) {
        this.logger.warn("Payment confirmed for order without a hold", {
          orderId: payload.orderId,
        });
        return;
      }
      reservationId = active.reservationId;
    }

    const result = await this.reservations.confirm(reservationId);
    if (result.status === "confirmed") {
      this.logger.info("Reservation confirmed after payment", {
        orderId: payload.orderId,
        reservationId,
        changed: result.changed,
      });
      return;
    }
    this.logger.warn("Could not confirm reservation after payment", {
      orderId: payload.orderId,
      reservationId,
      code: result.code,
      message: result.message,
    });
  }

  /**
   * Abort every in-flight allocation and wait until each has released any
   * hold it was granted (shutdown). Their handlers report the outcomes.
   */
  async abortAll(): Promise<void> {
    const pending = [...this.inFlight.values()];
    for (const { controller } of pending) {
      controller.abort();
    }
    await Promise.allSettled(pending.map(({ done }) => done));
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  private parse<S extends z.ZodTypeAny>(envelope: EventEnvelope, schema: S): z.output<S> | null {
    const parsed = schema.safeParse(envelope.payload);
    if (parsed.success) {
      return parsed.data;
    }
    this.logger.error("Discarding event with invalid payload", {
      eventId: envelope.id,
      eventType: envelope.eventType,
      issues: parsed.error.issues.map(
        (issue: z.ZodIssue) => `${issue.path.join(".")}: ${issue.message}`
      ),
    });
    return null;
  }
}
