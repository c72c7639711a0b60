/**
 * Narrow interfaces to the inventory and catalog services. HTTP clients live
 * in the hosting service; tests use in-process fakes.
 *
 * Definitive outcomes are returned as values. Transport failures are thrown,
 * with `TransientError` (or a coded socket error) for anything worth retrying.
 */

import type { FulfillmentOrder } from "../order.js";
import type { VendorCandidate } from "../selection/index.js";
import type { ReservationItem } from "./types.js";

export interface HoldRequest {
  orderId: string;
  vendorId: string;
  locationId: string;
  items: ReservationItem[];
  /** Epoch ms after which the collaborator may drop the hold */
  expiresAt: number;
  idempotencyKey: string;
}

export type HoldOutcome =
  | { status: "reserved"; reservationId: string }
  | { status: "rejected"; reason: string };

export type ConfirmOutcome = { status: "confirmed" } | { status: "rejected"; reason: string };

/** `not-found` counts as already released */
export type ReleaseOutcome = { status: "released" } | { status: "not-found" };

export interface InventoryClient {
  reserve(request: HoldRequest, signal: AbortSignal): Promise<HoldOutcome>;
  confirm(reservationId: string, signal: AbortSignal): Promise<ConfirmOutcome>;
  release(reservationId: string, signal: AbortSignal): Promise<ReleaseOutcome>;
}

export interface VendorAvailability {
  available: boolean;
  capacityInfo?: string | undefined;
}

export interface VendorCatalog {
  findCandidates(order: FulfillmentOrder, signal: AbortSignal): Promise<VendorCandidate[]>;
  getAvailability(vendorId: string, signal: AbortSignal): Promise<VendorAvailability>;
}
