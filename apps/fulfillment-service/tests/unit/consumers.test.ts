import { describe, it, expect, beforeEach, vi } from "vitest";
import {
  InMemoryReservationStore,
  ResilienceWrapper,
  StockReservationCoordinator,
  createMockLogger,
  createRecordingPublisher,
  noJitter,
  type EventEnvelope,
  type MockLogger,
  type UnknownRecord,
} from "@orderflow/core";
import {
  ScriptedInventoryClient,
  StaticVendorCatalog,
  acceptAfter,
  reject,
  vendorCandidate,
} from "@orderflow/core/testing";
import type { EventHandler } from "@orderflow/bus";
import { OrderEventConsumers, type EventSubscriber } from "../../src/consumers.js";

let sequence = 0;

function envelope(eventType: string, payload: UnknownRecord): EventEnvelope {
  return {
    id: `evt-${++sequence}`,
    eventType,
    payload,
    occurredAt: "2024-01-15T12:00:00.000Z",
    source: "order-service",
  };
}

const placed = (orderId = "order-1") =>
  envelope("order.placed", {
    orderId,
    lines: [{ productId: "sku-1", size: "M", quantity: 1 }],
    delivery: { latitude: 52.52, longitude: 13.405 },
    criterion: "lowest-price",
  });

const cancelled = (orderId = "order-1") => envelope("order.cancelled", { orderId, reason: "customer" });

describe("OrderEventConsumers", () => {
  let inventory: ScriptedInventoryClient;
  let catalog: StaticVendorCatalog;
  let coordinator: StockReservationCoordinator;
  let logger: MockLogger;
  let consumers: OrderEventConsumers;

  beforeEach(() => {
    inventory = new ScriptedInventoryClient();
    catalog = new StaticVendorCatalog([
      vendorCandidate({ vendorId: "A", unitPrice: 100 }),
      vendorCandidate({ vendorId: "B", unitPrice: 90 }),
    ]);
    coordinator = new StockReservationCoordinator({
      inventory,
      catalog,
      resilience: new ResilienceWrapper({
        retry: { maxAttempts: 2, baseDelayMs: 1, maxDelayMs: 1, jitterFn: noJitter },
        callTimeoutMs: 5_000,
      }),
      publisher: createRecordingPublisher(),
      store: new InMemoryReservationStore(),
    });
    logger = createMockLogger();
    consumers = new OrderEventConsumers({ reservations: coordinator, logger });
  });

  describe("order.placed", () => {
    it("allocates the order", async () => {
      await consumers.handleOrderPlaced(placed());

      expect(logger.getLastCallAt("INFO")).toEqual(
        expect.objectContaining({
          message: "Order allocated",
          data: { orderId: "order-1", reservationId: "hold-order-1-B", vendorId: "B", reused: false },
        })
      );
      expect(consumers.inFlightCount).toBe(0);
    });

    it("logs when no vendor accepts", async () => {
      inventory.onVendor("A", reject("no stock")).onVendor("B", reject("no stock"));

      await consumers.handleOrderPlaced(placed());

      expect(logger.getLastCallAt("WARN")).toMatchObject({
        message: "Order could not be allocated",
        data: { orderId: "order-1", code: "ALLOCATION_FAILED", reasons: 2 },
      });
    });

    it("acknowledges an invalid payload without allocating", async () => {
      await consumers.handleOrderPlaced(envelope("order.placed", { orderId: "order-1", lines: [] }));

      expect(catalog.candidateLookups).toBe(0);
      expect(logger.getLastCallAt("ERROR")).toMatchObject({
        message: "Discarding event with invalid payload",
        data: { eventType: "order.placed", issues: ["lines: Array must contain at least 1 element(s)", "delivery: Required"] },
      });
    });

    it("rethrows a catalog failure so the broker redelivers", async () => {
      catalog.candidatesError = () => new Error("catalog down");

      await expect(consumers.handleOrderPlaced(placed())).rejects.toThrow("catalog down");
      expect(consumers.inFlightCount).toBe(0);
    });
  });

  describe("order.cancelled", () => {
    it("releases a hold that lands after the cancellation", async () => {
      inventory.onVendor("B", acceptAfter(200));
      const placing = consumers.handleOrderPlaced(placed());
      await vi.waitFor(() => expect(inventory.reserveCalls).toHaveLength(1));
      expect(consumers.inFlightCount).toBe(1);

      await consumers.handleOrderCancelled(cancelled());
      await placing;

      expect(inventory.reserveCalls).toHaveLength(1);
      expect(inventory.releaseCalls).toEqual(["hold-order-1-B"]);
      expect(inventory.heldIds).toEqual([]);
      expect(logger.hasLoggedAt("INFO", "Allocation cancelled")).toBe(true);
      expect(logger.hasLoggedAt("DEBUG", "Cancelled order had no pending hold")).toBe(true);
      expect(await coordinator.findActiveForOrder("order-1")).toBeNull();
    });

    it("releases the hold of an allocated order", async () => {
      await consumers.handleOrderPlaced(placed());

      await consumers.handleOrderCancelled(cancelled());

      expect(inventory.releaseCalls).toEqual(["hold-order-1-B"]);
      expect(logger.getLastCallAt("INFO")).toMatchObject({
        message: "Released hold for cancelled order",
        data: { orderId: "order-1", reservationId: "hold-order-1-B", changed: true },
      });
    });

    it("leaves a confirmed hold in place", async () => {
      await consumers.handleOrderPlaced(placed());
      await coordinator.confirm("hold-order-1-B");

      await consumers.handleOrderCancelled(cancelled());

      expect(inventory.releaseCalls).toEqual([]);
      expect(logger.hasLoggedAt("DEBUG", "Cancelled order had no pending hold")).toBe(true);
    });
  });

  describe("abortAll", () => {
    it("waits for aborted allocations to release their holds", async () => {
      inventory.onVendor("B", acceptAfter(200));
      const placing = consumers.handleOrderPlaced(placed());
      await vi.waitFor(() => expect(inventory.reserveCalls).toHaveLength(1));

      await consumers.abortAll();

      expect(consumers.inFlightCount).toBe(0);
      expect(inventory.releaseCalls).toEqual(["hold-order-1-B"]);
      await placing;
      expect(logger.hasLoggedAt("INFO", "Allocation cancelled")).toBe(true);
    });
  });

  describe("order.payment_confirmed", () => {
    it("confirms the named reservation", async () => {
      await consumers.handleOrderPlaced(placed());

      await consumers.handlePaymentConfirmed(
        envelope("order.payment_confirmed", { orderId: "order-1", reservationId: "hold-order-1-B" })
      );

      expect(inventory.confirmCalls).toEqual(["hold-order-1-B"]);
      expect(logger.getLastCallAt("INFO")).toMatchObject({
        message: "Reservation confirmed after payment",
        data: { orderId: "order-1", reservationId: "hold-order-1-B", changed: true },
      });
    });

    it("looks up the order's hold when no reservation is named", async () => {
      await consumers.handleOrderPlaced(placed());

      await consumers.handlePaymentConfirmed(
        envelope("order.payment_confirmed", { orderId: "order-1" })
      );

      expect(inventory.confirmCalls).toEqual(["hold-order-1-B"]);
    });

    it("warns when the order holds nothing", async () => {
      await consumers.handlePaymentConfirmed(
        envelope("order.payment_confirmed", { orderId: "order-9" })
      );

      expect(inventory.confirmCalls).toEqual([]);
      expect(logger.hasLoggedAt("WARN", "Payment confirmed for order without a hold")).toBe(true);
    });

    it("warns when inventory refuses the confirmation", async () => {
      await consumers.handleOrderPlaced(placed());
      inventory.confirmBehaviour = "rejected";

      await consumers.handlePaymentConfirmed(
        envelope("order.payment_confirmed", { orderId: "order-1" })
      );

      expect(logger.getLastCallAt("WARN")).toMatchObject({
        message: "Could not confirm reservation after payment",
        data: { orderId: "order-1", code: "CONFIRMATION_REJECTED" },
      });
    });
  });

  describe("register", () => {
    it("subscribes every order event and unsubscribes them together", async () => {
      const handlers = new Map<string, EventHandler>();
      const unsubscribed: string[] = [];
      const bus: EventSubscriber = {
        subscribe(eventType, handler) {
          handlers.set(eventType, handler);
          return Promise.resolve(() => {
            unsubscribed.push(eventType);
          });
        },
      };

      const unsubscribeAll = await consumers.register(bus);

      expect([...handlers.keys()]).toEqual([
        "order.placed",
        "order.cancelled",
        "order.payment_confirmed",
      ]);
      await handlers.get("order.placed")?.(placed());
      expect(logger.hasLoggedAt("INFO", "Order allocated")).toBe(true);

      unsubscribeAll();
      expect(unsubscribed).toHaveLength(3);
    });
  });
});
