/**
 * In-process broker for tests and `memory://` development setups.
 *
 * Messages are queued per event type and survive consumer disconnects, like a
 * durable queue. Each queue delivers one message at a time. The reachability
 * switch simulates an outage: connected transports are told the connection
 * was lost and every call fails until the broker is reachable again.
 */

import { TransientError } from "@orderflow/core";
import type { BrokerMessage, BrokerTransport, MessageHandler } from "../types.js";

interface Binding {
  transport: InMemoryBrokerTransport;
  handler: MessageHandler;
}

export interface FailedDelivery {
  message: BrokerMessage;
  error: unknown;
}

export class InMemoryBroker {
  private reachable = true;
  private readonly queues = new Map<string, BrokerMessage[]>();
  private readonly bindings = new Map<string, Binding>();
  private readonly pumping = new Map<string, Promise<void>>();
  private readonly transports = new Set<InMemoryBrokerTransport>();
  private readonly accepted: BrokerMessage[] = [];
  private readonly failed: FailedDelivery[] = [];

  constructor(readonly name = "default") {}

  createTransport(): InMemoryBrokerTransport {
    const transport = new InMemoryBrokerTransport(this);
    this.transports.add(transport);
    return transport;
  }

  isReachable(): boolean {
    return this.reachable;
  }

  setReachable(reachable: boolean): void {
    if (this.reachable === reachable) {
      return;
    }
    this.reachable = reachable;
    if (!reachable) {
      for (const transport of this.transports) {
        transport.connectionLost(new TransientError(`In-memory broker '${this.name}' is unreachable`));
      }
      this.bindings.clear();
    }
  }

  /** Every message accepted by the broker, in arrival order */
  publishedMessages(eventType?: string): BrokerMessage[] {
    return this.accepted.filter((message) => eventType === undefined || message.eventType === eventType);
  }

  /** Messages waiting for a consumer */
  queuedMessages(eventType: string): BrokerMessage[] {
    return [...(this.queues.get(eventType) ?? [])];
  }

  /** Deliveries whose handler rejected */
  failedDeliveries(): FailedDelivery[] {
    return [...this.failed];
  }

  /** Resolves once every queue with a consumer is empty */
  async idle(): Promise<void> {
    while (this.pumping.size > 0) {
      await Promise.all(this.pumping.values());
    }
  }

  accept(message: BrokerMessage): void {
    this.accepted.push({ ...message });
    const queue = this.queues.get(message.eventType) ?? [];
    queue.push({ ...message });
    this.queues.set(message.eventType, queue);
    this.pump(message.eventType);
  }

  bind(transport: InMemoryBrokerTransport, eventTypes: readonly string[], handler: MessageHandler): void {
    this.unbind(transport);
    for (const eventType of eventTypes) {
      this.bindings.set(eventType, { transport, handler });
      this.pump(eventType);
    }
  }

  unbind(transport: InMemoryBrokerTransport): void {
    for (const [eventType, binding] of this.bindings) {
      if (binding.transport === transport) {
        this.bindings.delete(eventType);
      }
    }
  }

  private pump(eventType: string): void {
    if (this.pumping.has(eventType)) {
      return;
    }
    const delivery = this.deliver(eventType).finally(() => {
      this.pumping.delete(eventType);
      // A consumer may have bound after the loop saw no binding
      if (this.hasDeliverable(eventType)) {
        this.pump(eventType);
      }
    });
    this.pumping.set(eventType, delivery);
  }

  private hasDeliverable(eventType: string): boolean {
    return (
      this.reachable && this.bindings.has(eventType) && (this.queues.get(eventType)?.length ?? 0) > 0
    );
  }

  private async deliver(eventType: string): Promise<void> {
    // Let the publisher's call return before the consumer runs
    await Promise.resolve();
    for (;;) {
      const queue = this.queues.get(eventType);
      const binding = this.bindings.get(eventType);
      const message = queue?.[0];
      if (!this.reachable || !binding || !queue || !message) {
        return;
      }
      queue.shift();
      try {
        await binding.handler(message);
      } catch (error) {
        this.failed.push({ message, error });
      }
    }
  }
}

export class InMemoryBrokerTransport implements BrokerTransport {
  readonly name = "memory";
  private connected = false;
  private readonly lostListeners = new Set<(error: Error) => void>();

  constructor(private readonly broker: InMemoryBroker) {}

  isConnected(): boolean {
    return this.connected;
  }

  connect(signal: AbortSignal): Promise<void> {
    if (signal.aborted) {
      return Promise.reject(new TransientError("Connect aborted"));
    }
    if (!this.broker.isReachable()) {
      return Promise.reject(new TransientError(`In-memory broker '${this.broker.name}' is unreachable`));
    }
    this.connected = true;
    return Promise.resolve();
  }

  publish(message: BrokerMessage): Promise<void> {
    if (!this.connected || !this.broker.isReachable()) {
      return Promise.reject(new TransientError("Not connected to the in-memory broker"));
    }
    this.broker.accept(message);
    return Promise.resolve();
  }

  consume(eventTypes: readonly string[], handler: MessageHandler): Promise<void> {
    if (!this.connected) {
      return Promise.reject(new TransientError("Not connected to the in-memory broker"));
    }
    this.broker.bind(this, eventTypes, handler);
    return Promise.resolve();
  }

  close(): Promise<void> {
    this.connected = false;
    this.broker.unbind(this);
    return Promise.resolve();
  }

  onConnectionLost(listener: (error: Error) => void): () => void {
    this.lostListeners.add(listener);
    return () => {
      this.lostListeners.delete(listener);
    };
  }

  /** Called by the broker when it becomes unreachable */
  connectionLost(error: Error): void {
    if (!this.connected) {
      return;
    }
    this.connected = false;
    for (const listener of this.lostListeners) {
      listener(error);
    }
  }
}
