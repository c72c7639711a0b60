import { z } from "zod";
import type {
  ConfirmOutcome,
  HoldOutcome,
  HoldRequest,
  InventoryClient,
  ReleaseOutcome,
} from "@orderflow/core";
import { discardBody, readJson, readReason, sendJson, unexpectedStatus } from "./http.js";

const HoldCreatedSchema = z.object({
  reservationId: z.string().min(1),
});

/** Definitive refusals: no stock, conflicting hold, invalid items */
const REJECTION_STATUSES: ReadonlySet<number> = new Set([409, 410, 422]);

/**
 * Inventory service over HTTP.
 *
 * | Call | Request | Outcomes |
 * |------|---------|----------|
 * | reserve | `POST /reservations` + `Idempotency-Key` | 200/201 reserved, 409/422 rejected |
 * | confirm | `POST /reservations/{id}/confirm` | 2xx confirmed, 409/410/422 rejected |
 * | release | `POST /reservations/{id}/release` | 2xx released, 404 not-found |
 */
export class HttpInventoryClient implements InventoryClient {
  constructor(private readonly baseUrl: string) {}

  async reserve(request: HoldRequest, signal: AbortSignal): Promise<HoldOutcome> {
    const response = await sendJson({
      method: "POST",
      url: `${this.baseUrl}/reservations`,
      signal,
      headers: { "Idempotency-Key": request.idempotencyKey },
      body: {
        orderId: request.orderId,
        vendorId: request.vendorId,
        locationId: request.locationId,
        items: request.items,
        expiresAt: new Date(request.expiresAt).toISOString(),
      },
    });

    if (response.ok) {
      const body = await readJson(response, HoldCreatedSchema, "inventory reserve");
      return { status: "reserved", reservationId: body.reservationId };
    }
    if (REJECTION_STATUSES.has(response.status)) {
      return { status: "rejected", reason: await readReason(response) };
    }
    return unexpectedStatus("inventory reserve", response);
  }

  async confirm(reservationId: string, signal: AbortSignal): Promise<ConfirmOutcome> {
    const response = await sendJson({
      method: "POST",
      url: `${this.baseUrl}/reservations/${encodeURIComponent(reservationId)}/confirm`,
      signal,
    });

    if (response.ok) {
      await discardBody(response);
      return { status: "confirmed" };
    }
    if (REJECTION_STATUSES.has(response.status)) {
      return { status: "rejected", reason: await readReason(response) };
    }
    return unexpectedStatus("inventory confirm", response);
  }

  async release(reservationId: string, signal: AbortSignal): Promise<ReleaseOutcome> {
    const response = await sendJson({
      method: "POST",
      url: `${this.baseUrl}/reservations/${encodeURIComponent(reservationId)}/release`,
      signal,
    });

    if (response.ok) {
      await discardBody(response);
      return { status: "released" };
    }
    if (response.status === 404) {
      await discardBody(response);
      return { status: "not-found" };
    }
    return unexpectedStatus("inventory release", response);
  }
}
