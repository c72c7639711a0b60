/**
 * ## Broker Types
 *
 * A transport moves opaque messages; the client owns envelopes, buffering
 * and reconnection.
 */

import type { EventEnvelope } from "@orderflow/core";

/**
 * Message as it crosses the transport. `body` is the JSON envelope.
 */
export interface BrokerMessage {
  eventType: string;
  body: string;
}

export type MessageHandler = (message: BrokerMessage) => Promise<void>;

export interface BrokerTransport {
  /** Short name for logs ("memory", "sqs") */
  readonly name: string;

  /** Establish (or verify) the connection. Rejects when unreachable. */
  connect(signal: AbortSignal): Promise<void>;

  publish(message: BrokerMessage, signal: AbortSignal): Promise<void>;

  /**
   * Deliver messages of `eventTypes` to `handler`, one at a time. Replaces any
   * earlier binding. A rejected handler leaves the message unacknowledged.
   */
  consume(eventTypes: readonly string[], handler: MessageHandler): Promise<void>;

  /** Stop consuming and drop the connection. Safe to call repeatedly. */
  close(): Promise<void>;

  /** Returns an unsubscribe function */
  onConnectionLost(listener: (error: Error) => void): () => void;
}

export interface PendingEvent {
  eventId: string;
  eventType: string;
  body: string;
  enqueuedAt: number;
  replayAttempts: number;
}

export interface PublishResult {
  status: "sent" | "buffered";
  eventId: string;
}

export type EventHandler = (envelope: EventEnvelope) => Promise<void> | void;
