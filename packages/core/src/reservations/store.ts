/**
 * Reservation storage with version-checked updates.
 */

import { FulfillmentError } from "../errors/index.js";
import type { ReservationState } from "../fsm/index.js";
import type { Reservation } from "./types.js";

export const ReservationStoreError = FulfillmentError.forContext<
  "DUPLICATE_RESERVATION" | "PENDING_RESERVATION_EXISTS" | "VERSION_CONFLICT" | "RESERVATION_NOT_FOUND"
>("ReservationStore");

export interface ReservationUpdate {
  state: ReservationState;
  updatedAt: number;
}

export interface ReservationStore {
  get(reservationId: string): Promise<Reservation | null>;

  /** Pending or confirmed reservation of the order, if any */
  findActiveForOrder(orderId: string): Promise<Reservation | null>;

  /** Pending reservations with `expiresAt <= now`, oldest expiry first */
  findExpiredPending(now: number, limit: number): Promise<Reservation[]>;

  /**
   * @throws ReservationStoreError DUPLICATE_RESERVATION or PENDING_RESERVATION_EXISTS
   */
  insert(reservation: Reservation): Promise<void>;

  /**
   * Apply `update` if the stored version equals `expectedVersion`.
   *
   * @returns the stored record with `version` incremented
   * @throws ReservationStoreError VERSION_CONFLICT or RESERVATION_NOT_FOUND
   */
  update(reservationId: string, expectedVersion: number, update: ReservationUpdate): Promise<Reservation>;
}

function isActive(reservation: Reservation): boolean {
  return reservation.state === "pending" || reservation.state === "confirmed";
}

export class InMemoryReservationStore implements ReservationStore {
  private readonly records = new Map<string, Reservation>();

  get(reservationId: string): Promise<Reservation | null> {
    const record = this.records.get(reservationId);
    return Promise.resolve(record ? { ...record } : null);
  }

  findActiveForOrder(orderId: string): Promise<Reservation | null> {
    for (const record of this.records.values()) {
      if (record.orderId === orderId && isActive(record)) {
        return Promise.resolve({ ...record });
      }
    }
    return Promise.resolve(null);
  }

  findExpiredPending(now: number, limit: number): Promise<Reservation[]> {
    const expired = [...this.records.values()]
      .filter((record) => record.state === "pending" && record.expiresAt <= now)
      .sort((a, b) => a.expiresAt - b.expiresAt)
      .slice(0, limit)
      .map((record) => ({ ...record }));
    return Promise.resolve(expired);
  }

  insert(reservation: Reservation): Promise<void> {
    if (this.records.has(reservation.reservationId)) {
      return Promise.reject(
        new ReservationStoreError(
          "DUPLICATE_RESERVATION",
          `Reservation ${reservation.reservationId} already exists`,
          { reservationId: reservation.reservationId }
        )
      );
    }
    for (const record of this.records.values()) {
      if (record.orderId === reservation.orderId && record.state === "pending") {
        return Promise.reject(
          new ReservationStoreError(
            "PENDING_RESERVATION_EXISTS",
            `Order ${reservation.orderId} already holds pending reservation ${record.reservationId}`,
            { orderId: reservation.orderId, existingReservationId: record.reservationId }
          )
        );
      }
    }
    this.records.set(reservation.reservationId, { ...reservation });
    return Promise.resolve();
  }

  update(
    reservationId: string,
    expectedVersion: number,
    update: ReservationUpdate
  ): Promise<Reservation> {
    const record = this.records.get(reservationId);
    if (!record) {
      return Promise.reject(
        new ReservationStoreError("RESERVATION_NOT_FOUND", `Reservation ${reservationId} not found`, {
          reservationId,
        })
      );
    }
    if (record.version !== expectedVersion) {
      return Promise.reject(
        new ReservationStoreError(
          "VERSION_CONFLICT",
          `Reservation ${reservationId} is at version ${record.version}, expected ${expectedVersion}`,
          { reservationId, expectedVersion, actualVersion: record.version }
        )
      );
    }
    const next: Reservation = { ...record, ...update, version: record.version + 1 };
    this.records.set(reservationId, next);
    return Promise.resolve({ ...next });
  }

  /** Test helper */
  all(): Reservation[] {
    return [...this.records.values()].map((record) => ({ ...record }));
  }
}
