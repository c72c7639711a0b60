import { describe, it, expect, beforeEach, vi } from "vitest";
import {
  CircuitOpenError,
  ExhaustedRetriesError,
  OperationCancelledError,
  TimeoutError,
  TransientError,
} from "../../../src/errors/index.js";
import {
  ResilienceWrapper,
  noJitter,
  type CircuitStateChange,
} from "../../../src/resilience/index.js";

const fastRetry = { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 1, jitterFn: noJitter };

describe("ResilienceWrapper", () => {
  let wrapper: ResilienceWrapper;

  beforeEach(() => {
    wrapper = new ResilienceWrapper({ retry: fastRetry, callTimeoutMs: 20 });
  });

  it("returns the operation's result and hands it a live signal", async () => {
    let signal: AbortSignal | undefined;
    const result = await wrapper.execute("inventory", (callSignal) => {
      signal = callSignal;
      return Promise.resolve(42);
    });

    expect(result).toBe(42);
    expect(signal?.aborted).toBe(false);
  });

  it("retries a transient failure", async () => {
    const operation = vi
      .fn<(signal: AbortSignal) => Promise<string>>()
      .mockRejectedValueOnce(new TransientError("502"))
      .mockResolvedValueOnce("held");

    await expect(wrapper.execute("inventory", operation)).resolves.toBe("held");
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it("turns repeated timeouts into ExhaustedRetriesError", async () => {
    const error = await wrapper
      .execute("inventory", () => new Promise<never>(() => {}))
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ExhaustedRetriesError);
    expect(error).toMatchObject({ attempts: 3 });
    expect(error instanceof ExhaustedRetriesError && error.lastError).toBeInstanceOf(TimeoutError);
  });

  it("passes definitive errors through on the first attempt", async () => {
    const definitive = new Error("400 bad request");
    const operation = vi.fn(() => Promise.reject(definitive));

    await expect(wrapper.execute("inventory", operation)).rejects.toBe(definitive);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("stops retrying once the target's circuit opens", async () => {
    const operation = vi.fn(() => Promise.reject(new TransientError("503")));

    await expect(wrapper.execute("inventory", operation)).rejects.toBeInstanceOf(
      ExhaustedRetriesError
    );
    await expect(wrapper.execute("inventory", operation)).rejects.toBeInstanceOf(CircuitOpenError);

    expect(operation).toHaveBeenCalledTimes(5);
    expect(wrapper.getCircuit("inventory").getState()).toBe("open");
  });

  it("keeps one circuit per target", async () => {
    const failing = (): Promise<never> => Promise.reject(new TransientError("503"));
    await wrapper.execute("inventory", failing).catch(() => undefined);
    await wrapper.execute("inventory", failing).catch(() => undefined);
    await wrapper.execute("catalog", () => Promise.resolve([]));

    expect(
      wrapper.getCircuitSnapshots().map(({ target, state }) => ({ target, state }))
    ).toEqual([
      { target: "inventory", state: "open" },
      { target: "catalog", state: "closed" },
    ]);
  });

  it("forwards circuit transitions to listeners", async () => {
    const changes: CircuitStateChange[] = [];
    wrapper = new ResilienceWrapper({
      retry: { ...fastRetry, maxAttempts: 1 },
      circuit: { failureThreshold: 1 },
    });
    wrapper.onCircuitStateChange((change) => changes.push(change));

    await wrapper
      .execute("catalog", () => Promise.reject(new TransientError("503")))
      .catch(() => undefined);

    expect(changes).toHaveLength(1);
    expect(changes[0]).toMatchObject({ target: "catalog", from: "closed", to: "open" });
  });

  it("resetCircuit closes an open circuit", async () => {
    wrapper = new ResilienceWrapper({
      retry: { ...fastRetry, maxAttempts: 1 },
      circuit: { failureThreshold: 1 },
    });
    await wrapper
      .execute("inventory", () => Promise.reject(new TransientError("503")))
      .catch(() => undefined);

    wrapper.resetCircuit("inventory");

    expect(wrapper.getCircuit("inventory").getState()).toBe("closed");
  });

  it("rejects with OperationCancelledError when the caller aborts", async () => {
    const controller = new AbortController();
    const pending = wrapper.execute("inventory", () => new Promise<never>(() => {}), {
      signal: controller.signal,
    });
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(OperationCancelledError);
    expect(wrapper.getCircuit("inventory").snapshot().totalFailures).toBe(0);
  });

  it("lets an attempt in flight finish when asked to", async () => {
    const controller = new AbortController();
    let callSignal: AbortSignal | undefined;
    const pending = wrapper.execute(
      "inventory",
      (signal) => {
        callSignal = signal;
        return new Promise<string>((resolve) => setTimeout(() => resolve("held"), 5));
      },
      { signal: controller.signal, letAttemptFinish: true }
    );
    controller.abort();

    await expect(pending).resolves.toBe("held");
    expect(callSignal?.aborted).toBe(false);
  });

  it("skips the remaining retries after an abort when attempts may finish", async () => {
    const controller = new AbortController();
    const operation = vi.fn<(signal: AbortSignal) => Promise<string>>().mockImplementation(() => {
      controller.abort();
      return Promise.reject(new TransientError("503"));
    });

    const pending = wrapper.execute("inventory", operation, {
      signal: controller.signal,
      letAttemptFinish: true,
    });

    await expect(pending).rejects.toBeInstanceOf(OperationCancelledError);
    expect(operation).toHaveBeenCalledTimes(1);
  });
});
