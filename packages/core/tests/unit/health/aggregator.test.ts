import { describe, it, expect, beforeEach } from "vitest";
import { TransientError } from "../../../src/errors/index.js";
import {
  HealthAggregator,
  httpStatusFor,
  type BrokerStatus,
  type BrokerStatusListener,
  type BrokerStatusSource,
} from "../../../src/health/index.js";
import { createMockLogger, type MockLogger } from "../../../src/logging/index.js";
import { ResilienceWrapper } from "../../../src/resilience/index.js";

const NOW = Date.parse("2024-01-15T12:00:00Z");

class FakeBroker implements BrokerStatusSource {
  status: BrokerStatus = {
    state: "connected",
    pendingCount: 0,
    lastError: null,
    evictedCount: 0,
    droppedCount: 0,
    connectAttempts: 1,
    lastConnectedAt: NOW,
  };
  private readonly listeners = new Set<BrokerStatusListener>();

  getStatus(): BrokerStatus {
    return { ...this.status };
  }

  onStatusChange(listener: BrokerStatusListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  moveTo(state: BrokerStatus["state"], lastError: string | null = null): void {
    const from = this.status.state;
    this.status = { ...this.status, state, lastError };
    for (const listener of this.listeners) listener({ from, to: state, status: this.getStatus() });
  }
}

async function openCircuit(resilience: ResilienceWrapper, target: string): Promise<void> {
  await resilience
    .execute(target, () => Promise.reject(new TransientError("503")))
    .catch(() => undefined);
}

describe("HealthAggregator", () => {
  let broker: FakeBroker;
  let resilience: ResilienceWrapper;
  let logger: MockLogger;
  let health: HealthAggregator;

  beforeEach(() => {
    broker = new FakeBroker();
    resilience = new ResilienceWrapper({
      retry: { maxAttempts: 1 },
      circuit: { failureThreshold: 1 },
      now: () => NOW,
    });
    logger = createMockLogger();
    health = new HealthAggregator({
      circuits: resilience,
      broker,
      criticalTargets: ["inventory"],
      now: () => NOW,
      logger,
    });
  });

  it("is healthy with a connected broker and closed circuits", async () => {
    await resilience.execute("inventory", () => Promise.resolve("ok"));

    expect(health.getHealth()).toEqual({
      status: "healthy",
      checkedAt: "2024-01-15T12:00:00.000Z",
      dependencies: {
        broker: { state: "connected", pendingEvents: 0, lastError: null, evictedEvents: 0 },
        circuits: {
          inventory: { state: "closed", consecutiveFailures: 0, lastFailureAt: null },
        },
      },
    });
  });

  it("is degraded while the broker is not connected", () => {
    broker.status = { ...broker.status, state: "failed", pendingCount: 3, lastError: "refused" };

    const report = health.getHealth();

    expect(report.status).toBe("degraded");
    expect(report.dependencies.broker).toEqual({
      state: "failed",
      pendingEvents: 3,
      lastError: "refused",
      evictedEvents: 0,
    });
  });

  it("is degraded when a non-critical circuit is open", async () => {
    await openCircuit(resilience, "catalog");

    const report = health.getHealth();

    expect(report.status).toBe("degraded");
    expect(report.dependencies.circuits["catalog"]).toEqual({
      state: "open",
      consecutiveFailures: 1,
      lastFailureAt: "2024-01-15T12:00:00.000Z",
    });
  });

  it("is unhealthy when a critical circuit is open", async () => {
    await openCircuit(resilience, "inventory");
    broker.status = { ...broker.status, state: "disconnected" };

    expect(health.getHealth().status).toBe("unhealthy");
  });

  it("reports no broker section when running without one", () => {
    const standalone = new HealthAggregator({ circuits: resilience, now: () => NOW });

    expect(standalone.getHealth().dependencies.broker).toBeNull();
    expect(standalone.getHealth().status).toBe("healthy");
  });

  it("tells whether a target accepts traffic", async () => {
    expect(health.isAcceptingTraffic("inventory")).toBe(true);

    await openCircuit(resilience, "inventory");

    expect(health.isAcceptingTraffic("inventory")).toBe(false);
    expect(health.isAcceptingTraffic("never-called")).toBe(true);
  });

  describe("watch", () => {
    it("logs broker transitions at matching levels", () => {
      const stop = health.watch();

      broker.moveTo("disconnected", "socket closed");
      broker.moveTo("connecting");
      broker.moveTo("failed", "refused");
      broker.moveTo("connecting");
      broker.moveTo("connected");
      stop();
      broker.moveTo("disconnected");

      expect(logger.calls.map(({ level, message }) => `${level} ${message}`)).toEqual([
        "WARN Broker disconnected",
        "WARN Broker connecting",
        "ERROR Broker reconnect attempts exhausted, running degraded",
        "WARN Broker connecting",
        "INFO Broker connected",
      ]);
    });

    it("logs circuit transitions with their criticality", async () => {
      health.watch();

      await openCircuit(resilience, "inventory");

      expect(logger.getLastCallAt("WARN")).toMatchObject({
        message: "Circuit open",
        data: { target: "inventory", from: "closed", critical: true },
      });
    });
  });
});

describe("httpStatusFor", () => {
  it("maps only unhealthy to 503", () => {
    expect(httpStatusFor("healthy")).toBe(200);
    expect(httpStatusFor("degraded")).toBe(200);
    expect(httpStatusFor("unhealthy")).toBe(503);
  });
});
