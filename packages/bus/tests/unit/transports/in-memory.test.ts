import { describe, it, expect, beforeEach, vi } from "vitest";
import { TransientError } from "@orderflow/core";
import { InMemoryBroker, type InMemoryBrokerTransport } from "../../../src/transports/in-memory.js";
import type { BrokerMessage } from "../../../src/types.js";

const reserved: BrokerMessage = { eventType: "order.reserved", body: '{"n":1}' };

describe("InMemoryBroker", () => {
  let broker: InMemoryBroker;
  let transport: InMemoryBrokerTransport;
  const signal = new AbortController().signal;

  beforeEach(async () => {
    broker = new InMemoryBroker("test");
    transport = broker.createTransport();
    await transport.connect(signal);
  });

  it("delivers published messages to the bound consumer", async () => {
    const received: BrokerMessage[] = [];
    await transport.consume(["order.reserved"], (message) => {
      received.push(message);
      return Promise.resolve();
    });

    await transport.publish(reserved);
    await broker.idle();

    expect(received).toEqual([reserved]);
    expect(broker.publishedMessages("order.reserved")).toEqual([reserved]);
  });

  it("holds messages until a consumer binds", async () => {
    await transport.publish(reserved);
    expect(broker.queuedMessages("order.reserved")).toEqual([reserved]);

    const handler = vi.fn(() => Promise.resolve());
    await transport.consume(["order.reserved"], handler);
    await broker.idle();

    expect(handler).toHaveBeenCalledWith(reserved);
    expect(broker.queuedMessages("order.reserved")).toEqual([]);
  });

  it("records deliveries whose handler rejects", async () => {
    const error = new Error("handler failed");
    await transport.consume(["order.reserved"], () => Promise.reject(error));

    await transport.publish(reserved);
    await broker.idle();

    expect(broker.failedDeliveries()).toEqual([{ message: reserved, error }]);
  });

  it("tells connected transports when it becomes unreachable", async () => {
    const lost: Error[] = [];
    transport.onConnectionLost((error) => lost.push(error));

    broker.setReachable(false);

    expect(lost).toHaveLength(1);
    expect(lost[0]).toBeInstanceOf(TransientError);
    expect(transport.isConnected()).toBe(false);
    await expect(transport.publish(reserved)).rejects.toThrow("Not connected to the in-memory broker");
    await expect(transport.connect(signal)).rejects.toThrow(
      "In-memory broker 'test' is unreachable"
    );
  });

  it("accepts connections again once reachable", async () => {
    broker.setReachable(false);
    broker.setReachable(true);

    await transport.connect(signal);
    await transport.publish(reserved);

    expect(broker.publishedMessages()).toEqual([reserved]);
  });
});
