/**
 * Step definitions for broker-buffering.feature
 *
 * Runs the client against the in-process broker under fake timers.
 */
import { fileURLToPath } from "node:url";
import { loadFeature, describeFeature } from "@amiceli/vitest-cucumber";
import { expect, vi } from "vitest";
import { noJitter, type UnknownRecord } from "@orderflow/core";
import { ResilientBrokerClient, type BrokerClientOptions } from "../../src/client.js";
import { InMemoryBroker } from "../../src/transports/in-memory.js";
import type { PublishResult } from "../../src/types.js";

const NOW = Date.parse("2024-01-15T12:00:00Z");

// ============================================================================
// Test State
// ============================================================================

interface ScenarioState {
  broker: InMemoryBroker;
  settings: Partial<BrokerClientOptions>;
  client: ResilientBrokerClient | null;
  published: Map<string, UnknownRecord>;
  lastResult: PublishResult | null;
}

function initState(): ScenarioState {
  return {
    broker: new InMemoryBroker("orders"),
    settings: {},
    client: null,
    published: new Map(),
    lastResult: null,
  };
}

let state = initState();

function client(): ResilientBrokerClient {
  if (!state.client) {
    state.client = new ResilientBrokerClient({
      transport: state.broker.createTransport(),
      source: "fulfillment-service",
      jitterFn: noJitter,
      now: () => NOW,
      ...state.settings,
    });
  }
  return state.client;
}

async function publishFor(eventType: string, orderId: string): Promise<void> {
  const payload = { orderId, vendorId: "A", reservationId: `hold-${orderId}` };
  state.published.set(orderId, payload);
  state.lastResult = await client().publish(eventType, payload);
}

function pendingOrderIds(): string {
  return client()
    .getPendingEvents()
    .map((event) => {
      const envelope: unknown = JSON.parse(event.body);
      if (typeof envelope === "object" && envelope !== null && "payload" in envelope) {
        const payload = envelope.payload;
        if (typeof payload === "object" && payload !== null && "orderId" in payload) {
          return String(payload.orderId);
        }
      }
      return "?";
    })
    .join(", ");
}

// ============================================================================
// Feature Tests
// ============================================================================

const feature = await loadFeature(
  fileURLToPath(new URL("../features/behavior/broker-buffering.feature", import.meta.url))
);

describeFeature(feature, ({ Background, Rule, BeforeEachScenario, AfterEachScenario }) => {
  BeforeEachScenario(() => {
    vi.useFakeTimers();
    state = initState();
  });

  AfterEachScenario(async () => {
    await state.client?.stop();
    vi.useRealTimers();
  });

  Background(({ Given }) => {
    Given(
      "a broker client that retries the connection every {int} seconds",
      (_ctx: unknown, seconds: number) => {
        state.settings = {
          ...state.settings,
          backoffBaseMs: seconds * 1_000,
          backoffMaxMs: seconds * 1_000,
          maxReconnectAttempts: 20,
        };
      }
    );
  });

  // ==========================================================================
  // Rule: Events published during an outage are delivered after recovery
  // ==========================================================================

  Rule("Events published during an outage are delivered after recovery", ({ RuleScenario }) => {
    RuleScenario(
      "The broker comes back 10 seconds after a publish",
      ({ Given, When, Then, And }) => {
        Given("the broker is unreachable", () => {
          state.broker.setReachable(false);
        });

        And("the client has been started", async () => {
          client().start();
          await vi.advanceTimersByTimeAsync(0);
          expect(client().getStatus().state).toBe("connecting");
        });

        When(
          "an {string} event is published for order {string}",
          async (_ctx: unknown, eventType: string, orderId: string) => {
            await publishFor(eventType, orderId);
          }
        );

        Then("the publish result is {string}", (_ctx: unknown, status: string) => {
          expect(state.lastResult?.status).toBe(status);
        });

        And("{int} event is pending", (_ctx: unknown, count: number) => {
          expect(client().getStatus().pendingCount).toBe(count);
        });

        When("the broker becomes reachable after {int} seconds", async (_ctx: unknown, seconds: number) => {
          await vi.advanceTimersByTimeAsync(seconds * 1_000);
          expect(client().getStatus().state).toBe("connecting");
          state.broker.setReachable(true);
        });

        And("the next reconnect attempt has run", async () => {
          await vi.advanceTimersByTimeAsync(2_000);
          await vi.waitFor(() => expect(client().getStatus().state).toBe("connected"));
        });

        Then(
          "the broker received the {string} event for order {string} unchanged",
          (_ctx: unknown, eventType: string, orderId: string) => {
            const delivered = state.broker.publishedMessages(eventType);
            expect(delivered).toHaveLength(1);
            const [message] = delivered;
            expect(message && JSON.parse(message.body)).toMatchObject({
              eventType,
              payload: state.published.get(orderId),
              occurredAt: "2024-01-15T12:00:00.000Z",
              source: "fulfillment-service",
            });
          }
        );

        And("no events are pending", () => {
          expect(client().getStatus().pendingCount).toBe(0);
        });
      }
    );
  });

  // ==========================================================================
  // Rule: The buffer is bounded
  // ==========================================================================

  Rule("The buffer is bounded", ({ RuleScenario }) => {
    RuleScenario(
      "The oldest event gives way when the buffer is full",
      ({ Given, When, Then, And }) => {
        Given("the buffer holds at most {int} events", (_ctx: unknown, capacity: number) => {
          state.settings = { ...state.settings, maxPendingEvents: capacity };
        });

        And("the broker is unreachable", () => {
          state.broker.setReachable(false);
        });

        When("events are published for orders {string}", async (_ctx: unknown, orders: string) => {
          for (const orderId of orders.split(", ")) {
            await publishFor("order.reserved", orderId);
          }
        });

        Then("the pending events are for orders {string}", (_ctx: unknown, expected: string) => {
          expect(pendingOrderIds()).toBe(expected);
        });

        And("{int} event has been evicted", (_ctx: unknown, count: number) => {
          expect(client().getStatus().evictedCount).toBe(count);
        });
      }
    );
  });
});
