/**
 * ## Fulfillment Service
 *
 * Wires the resilience wrapper, broker client, reservation coordinator,
 * order consumers and health endpoint from one configuration. Every
 * component is an explicit object owned by the returned service; nothing is
 * module-global.
 *
 * Startup never waits for the broker: the broker client's supervisor keeps
 * reconnecting in the background and events published meanwhile are
 * buffered.
 */

import type { Server } from "node:http";
import type { Express } from "express";
import {
  HealthAggregator,
  InMemoryReservationStore,
  ResilienceWrapper,
  StockReservationCoordinator,
  createChildLogger,
  createScopedLogger,
  createSelectionEngine,
  describeError,
  systemClock,
  type Clock,
  type InventoryClient,
  type Logger,
  type ReservationStore,
  type VendorCatalog,
} from "@orderflow/core";
import {
  InMemoryBroker,
  ResilientBrokerClient,
  SqsBrokerTransport,
  type BrokerTransport,
} from "@orderflow/bus";
import { HttpVendorCatalog } from "./clients/catalog.js";
import { HttpInventoryClient } from "./clients/inventory.js";
import type { FulfillmentConfig } from "./config.js";
import { OrderEventConsumers } from "./consumers.js";
import { createHttpApp } from "./http/health.js";

export interface ServiceOverrides {
  transport?: BrokerTransport | undefined;
  inventory?: InventoryClient | undefined;
  catalog?: VendorCatalog | undefined;
  store?: ReservationStore | undefined;
  now?: Clock | undefined;
  jitterFn?: (() => number) | undefined;
  /** Logger per scope; defaults to console loggers at the configured level */
  loggerFor?: ((scope: string) => Logger) | undefined;
  /** Skip the HTTP listener (tests drive `app` directly) */
  listen?: boolean | undefined;
}

export interface FulfillmentService {
  readonly config: FulfillmentConfig;
  readonly bus: ResilientBrokerClient;
  readonly coordinator: StockReservationCoordinator;
  readonly consumers: OrderEventConsumers;
  readonly health: HealthAggregator;
  readonly resilience: ResilienceWrapper;
  readonly app: Express;
  start(): Promise<void>;
  stop(): Promise<void>;
  /** Run one expiry sweep now */
  sweepExpired(): Promise<void>;
  /** Port the HTTP server listens on, or null before start */
  port(): number | null;
}

function createTransport(config: FulfillmentConfig, logger: Logger): BrokerTransport {
  const endpoint = config.broker.endpoint;
  switch (endpoint.kind) {
    case "memory":
      return new InMemoryBroker(endpoint.name).createTransport();
    case "sqs":
      return new SqsBrokerTransport({ queueUrl: endpoint.queueUrl, region: endpoint.region, logger });
  }
}

export function createFulfillmentService(
  config: FulfillmentConfig,
  overrides: ServiceOverrides = {}
): FulfillmentService {
  const loggerFor =
    overrides.loggerFor ?? ((scope: string) => createScopedLogger(scope, config.logLevel));
  const logger = loggerFor("Service");
  const now = overrides.now ?? systemClock;

  const resilience = new ResilienceWrapper({
    circuit: config.circuit,
    retry: config.retry,
    callTimeoutMs: config.callTimeoutMs,
    now,
    loggerFor: overrides.loggerFor
      ? (target) => loggerFor(`Resilience:${target}`)
      : (target) => createChildLogger("Resilience", target, config.logLevel),
  });

  const bus = new ResilientBrokerClient({
    ...config.broker.settings,
    transport: overrides.transport ?? createTransport(config, loggerFor("Transport")),
    source: config.serviceName,
    jitterFn: overrides.jitterFn,
    now,
    logger: loggerFor("Broker"),
  });

  const coordinator = new StockReservationCoordinator({
    inventory: overrides.inventory ?? new HttpInventoryClient(config.inventoryServiceUrl),
    catalog: overrides.catalog ?? new HttpVendorCatalog(config.catalogServiceUrl),
    resilience,
    publisher: bus,
    store: overrides.store ?? new InMemoryReservationStore(),
    selection: createSelectionEngine({
      weights: config.selectionWeights,
      logger: loggerFor("Selection"),
    }),
    reservationTtlMs: config.reservationTtlMs,
    now,
    logger: loggerFor("Reservations"),
  });

  const consumers = new OrderEventConsumers({
    reservations: coordinator,
    logger: loggerFor("Consumers"),
  });

  const health = new HealthAggregator({
    circuits: resilience,
    broker: bus,
    criticalTargets: config.criticalTargets,
    now,
    logger: loggerFor("Health"),
  });

  const app = createHttpApp(health);

  let server: Server | null = null;
  let sweepTimer: ReturnType<typeof setInterval> | null = null;
  let sweeping: Promise<void> | null = null;
  let teardown: Array<() => void> = [];
  let started = false;

  const sweepExpired = (): Promise<void> => {
    if (sweeping) {
      return sweeping;
    }
    sweeping = coordinator
      .expireStale()
      .then(
        () => undefined,
        (error: unknown) => {
          logger.error("Expiry sweep failed", { error: describeError(error) });
        }
      )
      .finally(() => {
        sweeping = null;
      });
    return sweeping;
  };

  const listen = (): Promise<Server> =>
    new Promise<Server>((resolve, reject) => {
      const listening = app.listen(config.port, () => {
        listening.off("error", reject);
        resolve(listening);
      });
      listening.once("error", reject);
    });

  const port = (): number | null => {
    const address = server?.address();
    return address && typeof address === "object" ? address.port : null;
  };

  const closeServer = (target: Server): Promise<void> =>
    new Promise<void>((resolve, reject) => {
      target.close((error) => (error ? reject(error) : resolve()));
    });

  return {
    config,
    bus,
    coordinator,
    consumers,
    health,
    resilience,
    app,

    async start() {
      if (started) return;
      started = true;

      teardown = [health.watch(), await consumers.register(bus)];
      bus.start();

      sweepTimer = setInterval(() => {
        void sweepExpired();
      }, config.expirySweepIntervalMs);

      if (overrides.listen !== false) {
        server = await listen();
      }
      logger.info("Fulfillment service started", {
        serviceName: config.serviceName,
        port: port(),
        broker: config.broker.endpoint.kind,
      });
    },

    async stop() {
      if (!started) return;
      started = false;

      if (sweepTimer) {
        clearInterval(sweepTimer);
        sweepTimer = null;
      }
      await consumers.abortAll();

      if (server) {
        const closing = server;
        server = null;
        await closeServer(closing);
      }
      await sweeping;
      await bus.stop();

      for (const unsubscribe of teardown) unsubscribe();
      teardown = [];
      logger.info("Fulfillment service stopped", {
        pendingEvents: bus.getStatus().pendingCount,
      });
    },

    sweepExpired,
    port,
  };
}
