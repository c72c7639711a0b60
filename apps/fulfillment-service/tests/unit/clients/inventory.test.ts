import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { FulfillmentError, TransientError, isTransientError, type HoldRequest } from "@orderflow/core";
import { HttpInventoryClient } from "../../../src/clients/inventory.js";

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

const hold: HoldRequest = {
  orderId: "order-1",
  vendorId: "B",
  locationId: "B-main",
  items: [{ productId: "sku-1", size: "M", quantity: 2 }],
  expiresAt: Date.parse("2024-01-15T12:15:00Z"),
  idempotencyKey: "order-1:B:B-main:alloc-1",
};

describe("HttpInventoryClient", () => {
  const fetchMock = vi.fn<typeof fetch>();
  const signal = new AbortController().signal;
  let client: HttpInventoryClient;

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
    client = new HttpInventoryClient("http://inventory.test");
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe("reserve", () => {
    it("posts the hold with its idempotency key", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(201, { reservationId: "res-1" }));

      const outcome = await client.reserve(hold, signal);

      expect(outcome).toEqual({ status: "reserved", reservationId: "res-1" });
      const [url, init] = fetchMock.mock.calls[0] ?? [];
      expect(url).toBe("http://inventory.test/reservations");
      expect(init?.method).toBe("POST");
      expect(init?.signal).toBe(signal);
      expect(init?.headers).toEqual({
        Accept: "application/json",
        "Idempotency-Key": "order-1:B:B-main:alloc-1",
        "Content-Type": "application/json",
      });
      expect(JSON.parse(String(init?.body))).toEqual({
        orderId: "order-1",
        vendorId: "B",
        locationId: "B-main",
        items: [{ productId: "sku-1", size: "M", quantity: 2 }],
        expiresAt: "2024-01-15T12:15:00.000Z",
      });
    });

    it("reads the rejection reason from a JSON error body", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(409, { error: "insufficient stock" }));

      expect(await client.reserve(hold, signal)).toEqual({
        status: "rejected",
        reason: "insufficient stock",
      });
    });

    it("falls back to a plain-text body for the reason", async () => {
      fetchMock.mockResolvedValueOnce(new Response("size discontinued", { status: 422 }));

      expect(await client.reserve(hold, signal)).toEqual({
        status: "rejected",
        reason: "size discontinued",
      });
    });

    it("raises a transient error for 503 and discards its body", async () => {
      const response = new Response("busy", { status: 503 });
      fetchMock.mockResolvedValueOnce(response);

      const error = await client.reserve(hold, signal).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(TransientError);
      expect(error).toMatchObject({
        message: "POST http://inventory.test/reservations responded 503",
      });
      expect(response.bodyUsed).toBe(true);
    });

    it("treats 429 as transient", async () => {
      fetchMock.mockResolvedValueOnce(new Response(null, { status: 429 }));

      await expect(client.reserve(hold, signal)).rejects.toBeInstanceOf(TransientError);
    });

    it("raises a definitive error for an unmapped status", async () => {
      const response = new Response("bad request", { status: 400 });
      fetchMock.mockResolvedValueOnce(response);

      const error = await client.reserve(hold, signal).catch((caught: unknown) => caught);

      expect(FulfillmentError.hasCode(error, "UNEXPECTED_STATUS")).toBe(true);
      expect(isTransientError(error)).toBe(false);
      expect(response.bodyUsed).toBe(true);
    });

    it("rejects a success body without a reservation id", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(200, { id: "res-1" }));

      const error = await client.reserve(hold, signal).catch((caught: unknown) => caught);

      expect(FulfillmentError.hasCode(error, "INVALID_RESPONSE")).toBe(true);
    });

    it("lets socket failures through as transient", async () => {
      const refused = Object.assign(new Error("connect ECONNREFUSED"), { code: "ECONNREFUSED" });
      fetchMock.mockRejectedValueOnce(new TypeError("fetch failed", { cause: refused }));

      const error = await client.reserve(hold, signal).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(TypeError);
      expect(isTransientError(error)).toBe(true);
    });
  });

  describe("confirm", () => {
    it("confirms on success", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(200, {}));

      expect(await client.confirm("res/1", signal)).toEqual({ status: "confirmed" });
      expect(fetchMock.mock.calls[0]?.[0]).toBe("http://inventory.test/reservations/res%2F1/confirm");
    });

    it("reports the status line when a rejection has no body", async () => {
      fetchMock.mockResolvedValueOnce(new Response(null, { status: 410 }));

      expect(await client.confirm("res-1", signal)).toEqual({
        status: "rejected",
        reason: "HTTP 410",
      });
    });
  });

  describe("release", () => {
    it("releases on success", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(200, {}));

      expect(await client.release("res-1", signal)).toEqual({ status: "released" });
      expect(fetchMock.mock.calls[0]?.[0]).toBe("http://inventory.test/reservations/res-1/release");
    });

    it("reports an unknown hold as not found", async () => {
      fetchMock.mockResolvedValueOnce(new Response(null, { status: 404 }));

      expect(await client.release("res-1", signal)).toEqual({ status: "not-found" });
    });
  });
});
