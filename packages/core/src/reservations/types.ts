/**
 * ## Stock Reservation Types
 *
 * A reservation is the coordinator's record of a stock hold placed at one
 * vendor location. The inventory collaborator remains the system of record
 * for stock counts.
 */

import type { ReservationState } from "../fsm/index.js";
import type { ExcludedCandidate } from "../selection/index.js";

// =============================================================================
// Reservation Record
// =============================================================================

export interface ReservationItem {
  productId: string;
  size: string;
  quantity: number;
}

export interface Reservation {
  /** Id assigned by the inventory collaborator */
  reservationId: string;
  orderId: string;
  vendorId: string;
  locationId: string;
  items: ReservationItem[];
  state: ReservationState;
  createdAt: number;
  expiresAt: number;
  updatedAt: number;
  /** Incremented on every update; checked by the store */
  version: number;
  /** `orderId:vendorId:locationId:allocationId` */
  idempotencyKey: string;
}

/**
 * Retries within one allocation reuse the key; a later allocation of the
 * same order gets a new one.
 */
export function idempotencyKeyFor(
  orderId: string,
  vendorId: string,
  locationId: string,
  allocationId: string
): string {
  return `${orderId}:${vendorId}:${locationId}:${allocationId}`;
}

export const DEFAULT_RESERVATION_TTL_MS = 900_000;

// =============================================================================
// Operation Results
// =============================================================================

export type AllocationFailureKind = "rejected" | "unavailable" | "circuit-open" | "error";

export interface AllocationFailureReason {
  vendorId: string;
  locationId: string;
  kind: AllocationFailureKind;
  detail: string;
}

export type AllocationResult =
  | AllocationReservedResult
  | AllocationFailedResult
  | AllocationRejectedResult
  | AllocationCancelledResult;

export interface AllocationReservedResult {
  status: "reserved";
  reservation: Reservation;
  /** True when an existing pending or confirmed reservation was returned */
  reused: boolean;
  /** Candidates tried, including the winner (0 when reused) */
  attempts: number;
  /** Candidates passed over before the winner */
  reasons: AllocationFailureReason[];
}

export interface AllocationFailedResult {
  status: "failed";
  code: "ALLOCATION_FAILED";
  orderId: string;
  reasons: AllocationFailureReason[];
}

export interface AllocationRejectedResult {
  status: "rejected";
  code: "NO_CANDIDATES_AVAILABLE";
  orderId: string;
  reason: string;
  excluded: ExcludedCandidate[];
}

export interface AllocationCancelledResult {
  status: "cancelled";
  orderId: string;
}

export type ReservationErrorCode =
  | "RESERVATION_NOT_FOUND"
  | "RESERVATION_ALREADY_CONFIRMED"
  | "RESERVATION_ALREADY_RELEASED"
  | "RESERVATION_ALREADY_EXPIRED"
  | "CONFIRMATION_REJECTED";

export interface ReservationErrorResult<TCode extends ReservationErrorCode = ReservationErrorCode> {
  status: "error";
  code: TCode;
  message: string;
}

export type ConfirmResult =
  | { status: "confirmed"; reservation: Reservation; changed: boolean }
  | ReservationErrorResult<
      | "RESERVATION_NOT_FOUND"
      | "RESERVATION_ALREADY_RELEASED"
      | "RESERVATION_ALREADY_EXPIRED"
      | "CONFIRMATION_REJECTED"
    >;

export type ReleaseResult =
  | { status: "released"; reservation: Reservation; changed: boolean }
  | ReservationErrorResult<"RESERVATION_NOT_FOUND" | "RESERVATION_ALREADY_CONFIRMED">;

export type ReleaseForOrderResult = ReleaseResult | { status: "no-reservation"; orderId: string };

export interface ExpireStaleResult {
  expiredIds: string[];
  /** Holds whose collaborator release failed; retried on the next sweep */
  failedIds: string[];
}
