/**
 * ## Resilient Broker Client
 *
 * Publishes domain events at least once and dispatches consumed events to
 * handlers while the broker comes and goes.
 *
 * ```
 *            publish()
 *               │
 *   connected and buffer empty? ──yes──► transport.publish ──fail──┐
 *               │ no                                               │
 *               ▼                                                  ▼
 *        PendingEventBuffer (bounded FIFO) ◄───────────────── buffered
 *               ▲
 *   supervisor: disconnected/failed → connect() with backoff
 *               → connected → rebind consumers → drain buffer
 * ```
 *
 * Broker failures never reach the caller: `publish` resolves `sent` or
 * `buffered`, and an exhausted reconnect sequence leaves the client `failed`
 * until the supervisor's next recovery attempt.
 *
 * @example
 * ```typescript
 * const client = new ResilientBrokerClient({ transport, source: "fulfillment-service" });
 * client.start();
 *
 * await client.subscribe("order.placed", async (envelope) => handle(envelope.payload));
 * const { status } = await client.publish("order.reserved", { orderId: "ord_1" });
 * ```
 */

import {
  EventEnvelopeSchema,
  OperationCancelledError,
  calculateBackoff,
  connectionFSM,
  createNoOpLogger,
  defaultJitter,
  describeError,
  generateId,
  sleep,
  systemClock,
  withTimeout,
  type BrokerStatus,
  type BrokerStatusListener,
  type BrokerStatusSource,
  type Clock,
  type ConnectionState,
  type EventEnvelope,
  type EventPublisher,
  type Logger,
  type UnknownRecord,
} from "@orderflow/core";
import { PendingEventBuffer } from "./buffer.js";
import type {
  BrokerMessage,
  BrokerTransport,
  EventHandler,
  PendingEvent,
  PublishResult,
} from "./types.js";

export interface BrokerClientSettings {
  /** Attempts per connect sequence before the client is marked `failed` */
  maxReconnectAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  /** Pause between connect sequences while `failed` */
  recoveryIntervalMs: number;
  connectTimeoutMs: number;
  publishTimeoutMs: number;
  maxPendingEvents: number;
  /** Replays per buffered event before it is dropped */
  maxReplayAttempts: number;
}

export const BROKER_CLIENT_DEFAULTS: BrokerClientSettings = {
  maxReconnectAttempts: 5,
  backoffBaseMs: 1_000,
  backoffMaxMs: 60_000,
  recoveryIntervalMs: 30_000,
  connectTimeoutMs: 10_000,
  publishTimeoutMs: 5_000,
  maxPendingEvents: 1_000,
  maxReplayAttempts: 5,
};

export interface BrokerClientOptions extends Partial<BrokerClientSettings> {
  transport: BrokerTransport;
  /** Envelope `source`, normally the service name */
  source: string;
  jitterFn?: (() => number) | undefined;
  onEvict?: ((event: PendingEvent) => void) | undefined;
  now?: Clock | undefined;
  generateEventId?: (() => string) | undefined;
  logger?: Logger | undefined;
}

export class ResilientBrokerClient implements EventPublisher, BrokerStatusSource {
  private readonly transport: BrokerTransport;
  private readonly source: string;
  private readonly settings: BrokerClientSettings;
  private readonly jitterFn: () => number;
  private readonly onEvict: ((event: PendingEvent) => void) | undefined;
  private readonly now: Clock;
  private readonly generateEventId: () => string;
  private readonly logger: Logger;
  private readonly buffer: PendingEventBuffer;
  private readonly handlers = new Map<string, EventHandler[]>();
  private readonly statusListeners = new Set<BrokerStatusListener>();

  private state: ConnectionState = connectionFSM.initial;
  private lastError: string | null = null;
  private evictedCount = 0;
  private droppedCount = 0;
  private connectAttempts = 0;
  private lastConnectedAt: number | null = null;

  private lifecycle = new AbortController();
  private connectInFlight: Promise<boolean> | null = null;
  private supervisor: Promise<void> | null = null;
  private wakeSupervisor: (() => void) | null = null;
  private draining = false;

  constructor(options: BrokerClientOptions) {
    const { transport, source, jitterFn, onEvict, now, generateEventId, logger, ...overrides } =
      options;
    this.transport = transport;
    this.source = source;
    this.settings = { ...BROKER_CLIENT_DEFAULTS, ...overrides };
    this.jitterFn = jitterFn ?? defaultJitter;
    this.onEvict = onEvict;
    this.now = now ?? systemClock;
    this.generateEventId = generateEventId ?? (() => generateId("bus", "event"));
    this.logger = logger ?? createNoOpLogger();
    this.buffer = new PendingEventBuffer(this.settings.maxPendingEvents);

    this.transport.onConnectionLost((error) => {
      this.handleConnectionLost(error);
    });
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Run one connect sequence. Concurrent callers share it.
   *
   * @returns true when connected; false when the sequence was exhausted, the
   * client stopped, or the connection dropped again while replaying
   */
  connect(): Promise<boolean> {
    if (this.state === "connected") {
      return Promise.resolve(true);
    }
    if (!this.connectInFlight) {
      this.connectInFlight = this.runConnectSequence(this.lifecycle.signal).finally(() => {
        this.connectInFlight = null;
      });
    }
    return this.connectInFlight;
  }

  /**
   * Start the background supervisor without waiting for the broker.
   */
  start(): void {
    if (this.supervisor) {
      return;
    }
    if (this.lifecycle.signal.aborted) {
      this.lifecycle = new AbortController();
    }
    const signal = this.lifecycle.signal;
    this.supervisor = this.supervise(signal).catch((error: unknown) => {
      this.logger.error("Broker supervisor stopped unexpectedly", { error: describeError(error) });
    });
  }

  /**
   * Stop the supervisor and close the transport. Buffered events stay counted
   * in the status.
   */
  async stop(): Promise<void> {
    this.lifecycle.abort();
    this.wakeSupervisor?.();
    await this.supervisor;
    this.supervisor = null;
    await this.connectInFlight;
    await this.transport.close();
    if (this.state !== "disconnected") {
      this.setState("disconnected");
    }
    this.logger.info("Broker client stopped", { pendingEvents: this.buffer.size });
  }

  // ===========================================================================
  // Publishing
  // ===========================================================================

  async publish(eventType: string, payload: UnknownRecord): Promise<PublishResult> {
    const envelope: EventEnvelope = {
      id: this.generateEventId(),
      eventType,
      payload,
      occurredAt: new Date(this.now()).toISOString(),
      source: this.source,
    };
    const message: BrokerMessage = { eventType, body: JSON.stringify(envelope) };

    if (this.state !== "connected" || this.draining || this.buffer.size > 0) {
      this.enqueue(envelope.id, message);
      this.logger.debug("Broker not ready, buffering event", {
        eventId: envelope.id,
        eventType,
        state: this.state,
        pendingEvents: this.buffer.size,
      });
      if (this.state === "connected" && !this.draining) {
        this.drainBuffer().catch((error: unknown) => {
          this.logger.error("Buffer drain failed", { error: describeError(error) });
        });
      }
      return { status: "buffered", eventId: envelope.id };
    }

    try {
      await this.send(message);
      return { status: "sent", eventId: envelope.id };
    } catch (error) {
      this.enqueue(envelope.id, message);
      this.logger.warn("Broker unavailable, buffering event", {
        eventId: envelope.id,
        eventType,
        error: describeError(error),
      });
      this.markDisconnected(error);
      return { status: "buffered", eventId: envelope.id };
    }
  }

  // ===========================================================================
  // Consumption
  // ===========================================================================

  /**
   * Register a handler for `eventType`. Handlers of one type run
   * sequentially in registration order.
   *
   * @returns unsubscribe function
   */
  async subscribe(eventType: string, handler: EventHandler): Promise<() => void> {
    const existing = this.handlers.get(eventType);
    const isNewType = !existing;
    this.handlers.set(eventType, [...(existing ?? []), handler]);

    if (isNewType && this.state === "connected") {
      await this.bindConsumers();
    }

    return () => {
      const current = this.handlers.get(eventType) ?? [];
      this.handlers.set(
        eventType,
        current.filter((candidate) => candidate !== handler)
      );
    };
  }

  // ===========================================================================
  // Status
  // ===========================================================================

  getStatus(): BrokerStatus {
    return {
      state: this.state,
      pendingCount: this.buffer.size,
      lastError: this.lastError,
      evictedCount: this.evictedCount,
      droppedCount: this.droppedCount,
      connectAttempts: this.connectAttempts,
      lastConnectedAt: this.lastConnectedAt,
    };
  }

  onStatusChange(listener: BrokerStatusListener): () => void {
    this.statusListeners.add(listener);
    return () => {
      this.statusListeners.delete(listener);
    };
  }

  /** Buffered events, oldest first */
  getPendingEvents(): PendingEvent[] {
    return this.buffer.toArray();
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private async runConnectSequence(signal: AbortSignal): Promise<boolean> {
    const { maxReconnectAttempts, backoffBaseMs, backoffMaxMs, connectTimeoutMs } = this.settings;
    this.setState("connecting");

    for (let attempt = 0; attempt < maxReconnectAttempts; attempt++) {
      this.connectAttempts++;
      this.logger.debug("Connecting to broker", {
        transport: this.transport.name,
        attempt: attempt + 1,
        maxAttempts: maxReconnectAttempts,
      });

      try {
        await withTimeout((attemptSignal) => this.transport.connect(attemptSignal), {
          timeoutMs: connectTimeoutMs,
          label: "broker connect",
          signal,
        });
        await this.bindConsumers();
      } catch (error) {
        if (error instanceof OperationCancelledError) {
          this.setState("disconnected");
          return false;
        }
        this.lastError = describeError(error);
        this.logger.warn("Broker connection attempt failed", {
          attempt: attempt + 1,
          maxAttempts: maxReconnectAttempts,
          error: this.lastError,
        });

        if (attempt + 1 < maxReconnectAttempts) {
          const delayMs = calculateBackoff(attempt, {
            initialMs: backoffBaseMs,
            base: 2,
            maxMs: backoffMaxMs,
            jitterFn: this.jitterFn,
          });
          try {
            await sleep(delayMs, signal, "broker reconnect backoff");
          } catch (sleepError) {
            if (!(sleepError instanceof OperationCancelledError)) throw sleepError;
            this.setState("disconnected");
            return false;
          }
        }
        continue;
      }

      this.lastError = null;
      this.lastConnectedAt = this.now();
      this.setState("connected");
      this.logger.info("Connected to broker", {
        transport: this.transport.name,
        attempts: attempt + 1,
        pendingEvents: this.buffer.size,
      });
      await this.drainBuffer();
      return this.state === "connected";
    }

    this.setState("failed");
    this.logger.error("Broker reconnect attempts exhausted, running degraded", {
      maxAttempts: maxReconnectAttempts,
      pendingEvents: this.buffer.size,
      lastError: this.lastError,
    });
    return false;
  }

  private async supervise(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      if (this.state !== "connected") {
        const connected = await this.connect();
        if (!connected || this.getStatus().state !== "connected") {
          // A failed replay leaves the state disconnected; retry after one backoff step
          const waitMs =
            this.state === "failed" ? this.settings.recoveryIntervalMs : this.settings.backoffBaseMs;
          await this.idle(waitMs, signal);
          continue;
        }
      }
      // Woken by connection loss or stop()
      await this.idle(null, signal);
    }
  }

  private idle(ms: number | null, signal: AbortSignal): Promise<void> {
    return new Promise<void>((resolve) => {
      if (signal.aborted) {
        resolve();
        return;
      }
      let timer: ReturnType<typeof setTimeout> | undefined;
      const wake = (): void => {
        if (timer !== undefined) clearTimeout(timer);
        signal.removeEventListener("abort", wake);
        if (this.wakeSupervisor === wake) this.wakeSupervisor = null;
        resolve();
      };
      this.wakeSupervisor = wake;
      signal.addEventListener("abort", wake, { once: true });
      if (ms !== null) {
        timer = setTimeout(wake, ms);
      }
    });
  }

  private async drainBuffer(): Promise<void> {
    if (this.draining) {
      return;
    }
    this.draining = true;
    let delivered = 0;

    try {
      while (this.state === "connected") {
        const next = this.buffer.shift();
        if (!next) break;

        try {
          await this.send({ eventType: next.eventType, body: next.body });
          delivered++;
        } catch (error) {
          next.replayAttempts++;
          if (next.replayAttempts >= this.settings.maxReplayAttempts) {
            this.droppedCount++;
            this.logger.error("Dropping event after replay attempts exhausted", {
              eventId: next.eventId,
              eventType: next.eventType,
              replayAttempts: next.replayAttempts,
              error: describeError(error),
            });
          } else {
            const evicted = this.buffer.unshift(next);
            if (evicted) this.recordEviction(evicted);
          }
          this.markDisconnected(error);
          break;
        }
      }
    } finally {
      this.draining = false;
    }

    if (delivered > 0) {
      this.logger.report("Replayed buffered events", {
        delivered,
        remaining: this.buffer.size,
      });
    }
  }

  private send(message: BrokerMessage): Promise<void> {
    return withTimeout((signal) => this.transport.publish(message, signal), {
      timeoutMs: this.settings.publishTimeoutMs,
      label: `publish ${message.eventType}`,
    });
  }

  private enqueue(eventId: string, message: BrokerMessage): void {
    const evicted = this.buffer.push({
      eventId,
      eventType: message.eventType,
      body: message.body,
      enqueuedAt: this.now(),
      replayAttempts: 0,
    });
    if (evicted) {
      this.recordEviction(evicted);
    }
  }

  private recordEviction(evicted: PendingEvent): void {
    this.evictedCount++;
    this.logger.warn("Pending event buffer full, evicted oldest event", {
      eventId: evicted.eventId,
      eventType: evicted.eventType,
      capacity: this.buffer.capacity,
      evictedCount: this.evictedCount,
    });
    this.onEvict?.(evicted);
  }

  private async bindConsumers(): Promise<void> {
    const eventTypes = [...this.handlers.keys()];
    if (eventTypes.length === 0) {
      return;
    }
    await this.transport.consume(eventTypes, (message) => this.dispatch(message));
  }

  private async dispatch(message: BrokerMessage): Promise<void> {
    let raw: unknown;
    try {
      raw = JSON.parse(message.body);
    } catch (error) {
      this.logger.error("Discarding unparseable message", {
        eventType: message.eventType,
        error: describeError(error),
      });
      return;
    }

    const parsed = EventEnvelopeSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.error("Discarding message with invalid envelope", {
        eventType: message.eventType,
        issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      });
      return;
    }

    const envelope = parsed.data;
    for (const handler of this.handlers.get(envelope.eventType) ?? []) {
      try {
        await handler(envelope);
      } catch (error) {
        this.logger.error("Event handler failed", {
          eventId: envelope.id,
          eventType: envelope.eventType,
          error: describeError(error),
        });
        throw error;
      }
    }
  }

  private handleConnectionLost(error: Error): void {
    if (this.state !== "connected") {
      return;
    }
    this.logger.warn("Broker connection lost", { error: error.message });
    this.markDisconnected(error);
  }

  private markDisconnected(error: unknown): void {
    this.lastError = describeError(error);
    if (this.state !== "connected") {
      return;
    }
    this.setState("disconnected");
    this.transport.close().catch((closeError: unknown) => {
      this.logger.debug("Transport close after connection loss failed", {
        error: describeError(closeError),
      });
    });
    this.wakeSupervisor?.();
  }

  private setState(to: ConnectionState): void {
    const from = this.state;
    if (from === to) {
      return;
    }
    connectionFSM.assertTransition(from, to);
    this.state = to;

    const change = { from, to, status: this.getStatus() };
    for (const listener of this.statusListeners) {
      try {
        listener(change);
      } catch (listenerError) {
        this.logger.error("Broker status listener threw", {
          error: describeError(listenerError),
        });
      }
    }
  }
}
