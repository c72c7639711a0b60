/**
 * Coordinator wired to in-process fakes, shared by unit tests and step files.
 */

import { createRecordingPublisher, type RecordingPublisher } from "../../src/events/index.js";
import { createMockLogger, type MockLogger } from "../../src/logging/index.js";
import {
  InMemoryReservationStore,
  StockReservationCoordinator,
} from "../../src/reservations/index.js";
import {
  ResilienceWrapper,
  noJitter,
  type CircuitBreakerSettings,
  type RetrySettings,
} from "../../src/resilience/index.js";
import {
  ScriptedInventoryClient,
  StaticVendorCatalog,
  vendorCandidate,
} from "../../src/testing/index.js";

export const BASE_TIME = Date.parse("2024-01-15T12:00:00Z");
export const TTL_MS = 900_000;

export interface HarnessOptions {
  retry?: Partial<RetrySettings>;
  circuit?: Partial<CircuitBreakerSettings>;
  callTimeoutMs?: number;
}

export interface Harness {
  coordinator: StockReservationCoordinator;
  resilience: ResilienceWrapper;
  inventory: ScriptedInventoryClient;
  catalog: StaticVendorCatalog;
  publisher: RecordingPublisher;
  store: InMemoryReservationStore;
  logger: MockLogger;
  clock: { now: number; advance(ms: number): void };
}

/** Vendors A, B and C; lowest-price ranks them B, A, C */
export function threeVendors() {
  return [
    vendorCandidate({ vendorId: "A", unitPrice: 100, distanceKm: 5, rating: 4.5 }),
    vendorCandidate({ vendorId: "B", unitPrice: 90, distanceKm: 20, rating: 4.0 }),
    vendorCandidate({ vendorId: "C", unitPrice: 110, distanceKm: 2, rating: 4.8 }),
  ];
}

export function createHarness(options: HarnessOptions = {}): Harness {
  const clock = {
    now: BASE_TIME,
    advance(ms: number) {
      clock.now += ms;
    },
  };
  const logger = createMockLogger();
  const resilience = new ResilienceWrapper({
    retry: { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 1, jitterFn: noJitter, ...options.retry },
    circuit: options.circuit,
    callTimeoutMs: options.callTimeoutMs ?? 20,
    now: () => clock.now,
  });
  const inventory = new ScriptedInventoryClient();
  const catalog = new StaticVendorCatalog(threeVendors());
  const publisher = createRecordingPublisher();
  const store = new InMemoryReservationStore();
  let allocations = 0;

  const coordinator = new StockReservationCoordinator({
    inventory,
    catalog,
    resilience,
    publisher,
    store,
    reservationTtlMs: TTL_MS,
    now: () => clock.now,
    logger,
    generateAllocationId: () => `alloc-${++allocations}`,
  });

  return { coordinator, resilience, inventory, catalog, publisher, store, logger, clock };
}
