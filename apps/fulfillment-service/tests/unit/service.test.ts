import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { EventEnvelopeSchema, createMockLogger, type MockLogger } from "@orderflow/core";
import {
  ScriptedInventoryClient,
  StaticVendorCatalog,
  acceptAfter,
  vendorCandidate,
} from "@orderflow/core/testing";
import { InMemoryBroker, type BrokerMessage } from "@orderflow/bus";
import { loadConfig } from "../../src/config.js";
import { createFulfillmentService, type FulfillmentService } from "../../src/service.js";

const START = 1_700_000_000_000;

function payloadOf(message: BrokerMessage | undefined) {
  if (!message) {
    throw new Error("Expected a published message");
  }
  return EventEnvelopeSchema.parse(JSON.parse(message.body)).payload;
}

describe("createFulfillmentService", () => {
  let clock: number;
  let broker: InMemoryBroker;
  let inventory: ScriptedInventoryClient;
  let logger: MockLogger;
  let service: FulfillmentService;

  beforeEach(() => {
    clock = START;
    broker = new InMemoryBroker("orders");
    inventory = new ScriptedInventoryClient();
    logger = createMockLogger();

    const config = loadConfig({
      BROKER_URL: "memory://orders",
      INVENTORY_SERVICE_URL: "http://inventory.test",
      CATALOG_SERVICE_URL: "http://catalog.test",
      RETRY_BASE_DELAY_MS: "1",
      RETRY_MAX_DELAY_MS: "1",
      CALL_TIMEOUT_MS: "1000",
      EXPIRY_SWEEP_INTERVAL_MS: "3600000",
    });
    service = createFulfillmentService(config, {
      transport: broker.createTransport(),
      inventory,
      catalog: new StaticVendorCatalog([
        vendorCandidate({ vendorId: "A", unitPrice: 120 }),
        vendorCandidate({ vendorId: "B", unitPrice: 80 }),
      ]),
      now: () => clock,
      listen: false,
      loggerFor: () => logger,
    });
  });

  afterEach(async () => {
    await service.stop();
  });

  async function startConnected(): Promise<void> {
    await service.start();
    await vi.waitFor(() => expect(service.bus.getStatus().state).toBe("connected"));
  }

  function placeOrder(orderId: string): void {
    broker.accept({
      eventType: "order.placed",
      body: JSON.stringify({
        id: `evt-${orderId}`,
        eventType: "order.placed",
        payload: {
          orderId,
          lines: [{ productId: "sku-1", size: "M", quantity: 2 }],
          delivery: { latitude: 48.14, longitude: 11.58 },
          criterion: "lowest-price",
        },
        occurredAt: new Date(START).toISOString(),
        source: "order-service",
      }),
    });
  }

  it("allocates an order placed on the broker and publishes order.reserved", async () => {
    await startConnected();

    placeOrder("order-7");

    await vi.waitFor(() => expect(broker.publishedMessages("order.reserved")).toHaveLength(1));
    expect(payloadOf(broker.publishedMessages("order.reserved")[0])).toMatchObject({
      orderId: "order-7",
      vendorId: "B",
      reservationId: "hold-order-7-B",
      expiresAt: new Date(START + 900_000).toISOString(),
    });
    expect(service.health.getHealth().status).toBe("healthy");
  });

  it("expires a stale hold on the sweep", async () => {
    await startConnected();
    placeOrder("order-8");
    await vi.waitFor(() => expect(broker.publishedMessages("order.reserved")).toHaveLength(1));

    clock += 16 * 60_000;
    await service.sweepExpired();

    await vi.waitFor(() =>
      expect(broker.publishedMessages("order.reservation_expired")).toHaveLength(1)
    );
    expect(payloadOf(broker.publishedMessages("order.reservation_expired")[0])).toMatchObject({
      orderId: "order-8",
      reservationId: "hold-order-8-B",
    });
    expect(inventory.releaseCalls).toEqual(["hold-order-8-B"]);
    expect(await service.coordinator.findActiveForOrder("order-8")).toBeNull();
  });

  it("reports degraded while the broker is unreachable", async () => {
    broker.setReachable(false);

    await service.start();

    await vi.waitFor(() => expect(service.bus.getStatus().connectAttempts).toBeGreaterThan(0));
    expect(service.health.getHealth().status).toBe("degraded");
    expect(logger.hasLoggedAt("INFO", "Fulfillment service started")).toBe(true);
  });

  it("lets an allocation in flight release its hold before stopping", async () => {
    inventory.onVendor("B", acceptAfter(300));
    await startConnected();
    placeOrder("order-9");
    await vi.waitFor(() => expect(inventory.reserveCalls).toHaveLength(1));

    await service.stop();

    expect(inventory.releaseCalls).toEqual(["hold-order-9-B"]);
    expect(inventory.heldIds).toEqual([]);
    expect(broker.publishedMessages("order.reserved")).toEqual([]);
  });

  it("stops once and reports the events still pending", async () => {
    await startConnected();

    await service.stop();
    await service.stop();

    expect(logger.getCallsAtLevel("INFO").filter((call) => call.message === "Fulfillment service stopped")).toEqual([
      expect.objectContaining({ data: { pendingEvents: 0 } }),
    ]);
  });
});
