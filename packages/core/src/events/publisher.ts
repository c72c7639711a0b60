import type { UnknownRecord } from "../types.js";

/**
 * Structural view of the broker client used by the core. Keeps
 * `@orderflow/core` free of a dependency on the bus package.
 *
 * Implementations must not throw for broker unavailability.
 */
export interface EventPublisher {
  publish(eventType: string, payload: UnknownRecord): Promise<unknown>;
}

/**
 * Publisher that records events in memory.
 */
export interface RecordingPublisher extends EventPublisher {
  readonly published: ReadonlyArray<{ eventType: string; payload: UnknownRecord }>;
  ofType(eventType: string): UnknownRecord[];
  clear(): void;
}

export function createRecordingPublisher(): RecordingPublisher {
  const published: Array<{ eventType: string; payload: UnknownRecord }> = [];
  return {
    get published() {
      return published;
    },
    publish(eventType, payload) {
      published.push({ eventType, payload });
      return Promise.resolve({ status: "sent" });
    },
    ofType(eventType) {
      return published.filter((event) => event.eventType === eventType).map((event) => event.payload);
    },
    clear() {
      published.length = 0;
    },
  };
}
