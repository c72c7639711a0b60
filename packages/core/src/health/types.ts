import type { CircuitState, ConnectionState } from "../fsm/index.js";
import type { CircuitSnapshot, CircuitStateListener } from "../resilience/index.js";

/**
 * Broker client status as reported by `getStatus()`.
 */
export interface BrokerStatus {
  state: ConnectionState;
  pendingCount: number;
  lastError: string | null;
  evictedCount: number;
  droppedCount: number;
  connectAttempts: number;
  /** Epoch ms of the last successful connection */
  lastConnectedAt: number | null;
}

export interface BrokerStatusChange {
  from: ConnectionState;
  to: ConnectionState;
  status: BrokerStatus;
}

export type BrokerStatusListener = (change: BrokerStatusChange) => void;

/**
 * Structural view of the broker client.
 */
export interface BrokerStatusSource {
  getStatus(): BrokerStatus;
  onStatusChange(listener: BrokerStatusListener): () => void;
}

/**
 * Structural view of the resilience wrapper.
 */
export interface CircuitStatusSource {
  getCircuitSnapshots(): CircuitSnapshot[];
  onCircuitStateChange(listener: CircuitStateListener): () => void;
}

export type HealthStatus = "healthy" | "degraded" | "unhealthy";

export interface CircuitHealth {
  state: CircuitState;
  consecutiveFailures: number;
  lastFailureAt: string | null;
}

export interface BrokerHealth {
  state: ConnectionState;
  pendingEvents: number;
  lastError: string | null;
  evictedEvents: number;
}

export interface HealthReport {
  status: HealthStatus;
  /** ISO-8601 */
  checkedAt: string;
  dependencies: {
    broker: BrokerHealth | null;
    circuits: Record<string, CircuitHealth>;
  };
}
