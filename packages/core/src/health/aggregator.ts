/**
 * ## Health Aggregator
 *
 * Folds broker and circuit state into one report:
 *
 * | Condition | Status |
 * |-----------|--------|
 * | open circuit on a critical target | unhealthy |
 * | broker not connected | degraded |
 * | any circuit not closed | degraded |
 * | otherwise | healthy |
 */

import { createNoOpLogger, type Logger } from "../logging/index.js";
import { systemClock, type Clock } from "../types.js";
import type {
  BrokerStatusSource,
  CircuitHealth,
  CircuitStatusSource,
  HealthReport,
  HealthStatus,
} from "./types.js";

export interface HealthAggregatorOptions {
  circuits: CircuitStatusSource;
  /** Absent when the service runs without a broker */
  broker?: BrokerStatusSource | undefined;
  /** Targets whose open circuit makes the service unhealthy */
  criticalTargets?: readonly string[] | undefined;
  now?: Clock | undefined;
  logger?: Logger | undefined;
}

export class HealthAggregator {
  private readonly circuits: CircuitStatusSource;
  private readonly broker: BrokerStatusSource | undefined;
  private readonly criticalTargets: ReadonlySet<string>;
  private readonly now: Clock;
  private readonly logger: Logger;

  constructor(options: HealthAggregatorOptions) {
    this.circuits = options.circuits;
    this.broker = options.broker;
    this.criticalTargets = new Set(options.criticalTargets ?? []);
    this.now = options.now ?? systemClock;
    this.logger = options.logger ?? createNoOpLogger();
  }

  getHealth(): HealthReport {
    const findings = new Set<HealthStatus>();

    const brokerStatus = this.broker?.getStatus();
    if (brokerStatus && brokerStatus.state !== "connected") {
      findings.add("degraded");
    }

    const circuits: Record<string, CircuitHealth> = {};
    for (const snapshot of this.circuits.getCircuitSnapshots()) {
      circuits[snapshot.target] = {
        state: snapshot.state,
        consecutiveFailures: snapshot.consecutiveFailures,
        lastFailureAt:
          snapshot.lastFailureAt === null ? null : new Date(snapshot.lastFailureAt).toISOString(),
      };
      if (snapshot.state === "open" && this.criticalTargets.has(snapshot.target)) {
        findings.add("unhealthy");
      } else if (snapshot.state !== "closed") {
        findings.add("degraded");
      }
    }

    const status: HealthStatus = findings.has("unhealthy")
      ? "unhealthy"
      : findings.has("degraded")
        ? "degraded"
        : "healthy";

    return {
      status,
      checkedAt: new Date(this.now()).toISOString(),
      dependencies: {
        broker: brokerStatus
          ? {
              state: brokerStatus.state,
              pendingEvents: brokerStatus.pendingCount,
              lastError: brokerStatus.lastError,
              evictedEvents: brokerStatus.evictedCount,
            }
          : null,
        circuits,
      },
    };
  }

  /**
   * False while the target's circuit refuses calls.
   */
  isAcceptingTraffic(target: string): boolean {
    const snapshot = this.circuits
      .getCircuitSnapshots()
      .find((candidate) => candidate.target === target);
    return snapshot ? snapshot.acceptingCalls : true;
  }

  /**
   * Log broker and circuit transitions until the returned function is called.
   */
  watch(): () => void {
    const unsubscribers: Array<() => void> = [];

    if (this.broker) {
      unsubscribers.push(
        this.broker.onStatusChange(({ from, to, status }) => {
          const data = { from, to, pendingEvents: status.pendingCount, lastError: status.lastError };
          if (to === "connected") {
            this.logger.info("Broker connected", data);
          } else if (to === "failed") {
            this.logger.error("Broker reconnect attempts exhausted, running degraded", data);
          } else {
            this.logger.warn(`Broker ${to}`, data);
          }
        })
      );
    }

    unsubscribers.push(
      this.circuits.onCircuitStateChange(({ target, from, to }) => {
        const critical = this.criticalTargets.has(target);
        if (to === "closed") {
          this.logger.info("Circuit closed", { target, from });
        } else {
          this.logger.warn(`Circuit ${to}`, { target, from, critical });
        }
      })
    );

    return () => {
      for (const unsubscribe of unsubscribers) {
        unsubscribe();
      }
    };
  }
}

export function httpStatusFor(status: HealthStatus): 200 | 503 {
  return status === "unhealthy" ? 503 : 200;
}
