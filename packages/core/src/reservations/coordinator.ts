/**
 * ## Stock Reservation Coordinator
 *
 * Turns a ranked vendor list into one stock hold, trying candidates strictly
 * in rank order:
 *
 * ```
 * for candidate in ranking:
 *   reserve (inventory, via resilience wrapper)
 *     reserved              → store pending, publish order.reserved, stop
 *     rejected              → reason "rejected", next
 *     ExhaustedRetriesError → reason "unavailable", next
 *     CircuitOpenError      → reason "circuit-open", next
 *     other error           → reason "error", next
 * none left → ALLOCATION_FAILED, publish order.allocation_failed
 * ```
 *
 * Allocation for one order is single-flight: concurrent calls share the
 * in-flight promise. Confirm, release and expiry of one reservation are
 * serialised through a keyed mutex, so repeated releases reach the
 * collaborator once.
 */

import {
  CircuitOpenError,
  ExhaustedRetriesError,
  OperationCancelledError,
  describeError,
} from "../errors/index.js";
import { FULFILLMENT_EVENTS, type EventPublisher } from "../events/index.js";
import { reservationFSM, type ReservationState } from "../fsm/index.js";
import { generateId } from "../ids.js";
import { createNoOpLogger, type Logger } from "../logging/index.js";
import { requiredQuantity, resolveCriterion, type FulfillmentOrder } from "../order.js";
import type { ResilienceWrapper } from "../resilience/index.js";
import {
  createSelectionEngine,
  type ExcludedCandidate,
  type RankedCandidate,
  type SelectionEngine,
  type VendorCandidate,
} from "../selection/index.js";
import { systemClock, type Clock, type UnknownRecord } from "../types.js";
import type { HoldOutcome, InventoryClient, VendorCatalog } from "./collaborators.js";
import { KeyedMutex } from "./keyed-mutex.js";
import { InMemoryReservationStore, type ReservationStore } from "./store.js";
import {
  DEFAULT_RESERVATION_TTL_MS,
  idempotencyKeyFor,
  type AllocationFailureReason,
  type AllocationResult,
  type ConfirmResult,
  type ExpireStaleResult,
  type ReleaseForOrderResult,
  type ReleaseResult,
  type Reservation,
} from "./types.js";

export const INVENTORY_TARGET = "inventory";
export const CATALOG_TARGET = "catalog";

const EXPIRY_BATCH_SIZE = 100;

export interface ReservationCoordinatorOptions {
  inventory: InventoryClient;
  catalog: VendorCatalog;
  resilience: ResilienceWrapper;
  publisher: EventPublisher;
  store?: ReservationStore | undefined;
  selection?: SelectionEngine | undefined;
  reservationTtlMs?: number | undefined;
  now?: Clock | undefined;
  logger?: Logger | undefined;
  /** Id shared by the reserve calls of one allocation; part of their idempotency keys */
  generateAllocationId?: (() => string) | undefined;
}

export interface AllocateOptions {
  signal?: AbortSignal | undefined;
}

export class StockReservationCoordinator {
  private readonly inventory: InventoryClient;
  private readonly catalog: VendorCatalog;
  private readonly resilience: ResilienceWrapper;
  private readonly publisher: EventPublisher;
  private readonly store: ReservationStore;
  private readonly selection: SelectionEngine;
  private readonly ttlMs: number;
  private readonly now: Clock;
  private readonly logger: Logger;
  private readonly generateAllocationId: () => string;
  private readonly inFlight = new Map<string, Promise<AllocationResult>>();
  private readonly mutex = new KeyedMutex();

  constructor(options: ReservationCoordinatorOptions) {
    this.inventory = options.inventory;
    this.catalog = options.catalog;
    this.resilience = options.resilience;
    this.publisher = options.publisher;
    this.store = options.store ?? new InMemoryReservationStore();
    this.logger = options.logger ?? createNoOpLogger();
    this.selection = options.selection ?? createSelectionEngine({ logger: this.logger });
    this.ttlMs = options.reservationTtlMs ?? DEFAULT_RESERVATION_TTL_MS;
    this.now = options.now ?? systemClock;
    this.generateAllocationId =
      options.generateAllocationId ?? (() => generateId("fulfillment", "allocation"));
  }

  /**
   * Fetch candidates, rank them and reserve stock at the best one that
   * accepts.
   *
   * @throws when the catalog cannot be reached; the caller may redeliver
   */
  allocate(order: FulfillmentOrder, options: AllocateOptions = {}): Promise<AllocationResult> {
    return this.singleFlight(order.orderId, async () => {
      const existing = await this.store.findActiveForOrder(order.orderId);
      if (existing) {
        return this.reused(existing);
      }

      let candidates: VendorCandidate[];
      let inactive: ExcludedCandidate[];
      try {
        candidates = await this.resilience.execute(
          CATALOG_TARGET,
          (signal) => this.catalog.findCandidates(order, signal),
          { signal: options.signal }
        );
        ({ active: candidates, inactive } = await this.dropInactiveVendors(candidates, options.signal));
      } catch (error) {
        if (error instanceof OperationCancelledError) {
          return this.cancelled(order.orderId);
        }
        this.logger.error("Candidate lookup failed", {
          orderId: order.orderId,
          error: describeError(error),
        });
        throw error;
      }

      const criterion = resolveCriterion(order);
      const selection = this.selection.rank(candidates, {
        criterion,
        requiredQuantity: requiredQuantity(order),
      });

      if (selection.status === "rejected") {
        const excluded = [...inactive, ...selection.excluded];
        this.logger.warn("No vendor can serve order", {
          orderId: order.orderId,
          criterion,
          excluded: excluded.length,
        });
        await this.emit(FULFILLMENT_EVENTS.ALLOCATION_FAILED, {
          orderId: order.orderId,
          code: selection.code,
          reasons: [],
          timestamp: this.timestamp(),
        });
        return {
          status: "rejected",
          code: selection.code,
          orderId: order.orderId,
          reason: selection.reason,
          excluded,
        };
      }

      this.logger.info("Allocation started", {
        orderId: order.orderId,
        criterion,
        candidates: selection.ranking.length,
      });
      return this.tryCandidates(order, selection.ranking, options.signal);
    });
  }

  /**
   * Reserve at the first candidate of `ranking` that accepts.
   */
  reserveRanked(
    order: FulfillmentOrder,
    ranking: readonly RankedCandidate[],
    options: AllocateOptions = {}
  ): Promise<AllocationResult> {
    return this.singleFlight(order.orderId, async () => {
      const existing = await this.store.findActiveForOrder(order.orderId);
      if (existing) {
        return this.reused(existing);
      }
      return this.tryCandidates(order, ranking, options.signal);
    });
  }

  /**
   * Turn a pending hold into a committed one. Confirming twice is a no-op.
   */
  confirm(reservationId: string): Promise<ConfirmResult> {
    return this.mutex.runExclusive<ConfirmResult>(reservationId, async () => {
      const reservation = await this.store.get(reservationId);
      if (!reservation) {
        return notFound(reservationId);
      }

      switch (reservation.state) {
        case "confirmed":
          return { status: "confirmed", reservation, changed: false };
        case "released":
          return {
            status: "error",
            code: "RESERVATION_ALREADY_RELEASED",
            message: `Reservation ${reservationId} was released`,
          };
        case "expired":
          return alreadyExpired(reservationId);
        case "pending":
          break;
      }

      if (reservation.expiresAt <= this.now()) {
        return alreadyExpired(reservationId);
      }

      const outcome = await this.resilience.execute(INVENTORY_TARGET, (signal) =>
        this.inventory.confirm(reservationId, signal)
      );
      if (outcome.status === "rejected") {
        this.logger.warn("Inventory rejected confirmation", {
          reservationId,
          reason: outcome.reason,
        });
        return {
          status: "error",
          code: "CONFIRMATION_REJECTED",
          message: `Inventory rejected confirmation of ${reservationId}: ${outcome.reason}`,
        };
      }

      const confirmed = await this.transition(reservation, "confirmed");
      this.logger.info("Reservation confirmed", {
        reservationId,
        orderId: confirmed.orderId,
      });
      await this.emit(FULFILLMENT_EVENTS.RESERVATION_CONFIRMED, {
        orderId: confirmed.orderId,
        vendorId: confirmed.vendorId,
        reservationId,
        timestamp: this.timestamp(),
      });
      return { status: "confirmed", reservation: confirmed, changed: true };
    });
  }

  /**
   * Release a pending hold. Releasing an already released or expired
   * reservation succeeds with `changed: false`.
   */
  release(reservationId: string): Promise<ReleaseResult> {
    return this.mutex.runExclusive<ReleaseResult>(reservationId, async () => {
      const reservation = await this.store.get(reservationId);
      if (!reservation) {
        return notFound(reservationId);
      }

      switch (reservation.state) {
        case "released":
        case "expired":
          return { status: "released", reservation, changed: false };
        case "confirmed":
          return {
            status: "error",
            code: "RESERVATION_ALREADY_CONFIRMED",
            message: `Reservation ${reservationId} is confirmed and cannot be released`,
          };
        case "pending":
          break;
      }

      await this.releaseHold(reservationId);
      const released = await this.transition(reservation, "released");
      this.logger.info("Reservation released", { reservationId, orderId: released.orderId });
      await this.emit(FULFILLMENT_EVENTS.RESERVATION_RELEASED, {
        orderId: released.orderId,
        vendorId: released.vendorId,
        reservationId,
        timestamp: this.timestamp(),
      });
      return { status: "released", reservation: released, changed: true };
    });
  }

  async releaseForOrder(orderId: string): Promise<ReleaseForOrderResult> {
    const active = await this.store.findActiveForOrder(orderId);
    if (!active || active.state !== "pending") {
      return { status: "no-reservation", orderId };
    }
    return this.release(active.reservationId);
  }

  /**
   * Release and expire pending holds past their expiry. A hold whose
   * collaborator release fails stays pending for the next sweep.
   */
  async expireStale(now: number = this.now()): Promise<ExpireStaleResult> {
    const stale = await this.store.findExpiredPending(now, EXPIRY_BATCH_SIZE);
    const result: ExpireStaleResult = { expiredIds: [], failedIds: [] };

    for (const candidate of stale) {
      const outcome = await this.mutex.runExclusive(candidate.reservationId, async () => {
        const reservation = await this.store.get(candidate.reservationId);
        if (!reservation || reservation.state !== "pending" || reservation.expiresAt > now) {
          return "skipped" as const;
        }
        try {
          await this.releaseHold(reservation.reservationId);
        } catch (error) {
          this.logger.warn("Expiry release failed, will retry on next sweep", {
            reservationId: reservation.reservationId,
            error: describeError(error),
          });
          return "failed" as const;
        }
        const expired = await this.transition(reservation, "expired");
        await this.emit(FULFILLMENT_EVENTS.RESERVATION_EXPIRED, {
          orderId: expired.orderId,
          vendorId: expired.vendorId,
          reservationId: expired.reservationId,
          timestamp: this.timestamp(),
        });
        return "expired" as const;
      });

      if (outcome === "expired") result.expiredIds.push(candidate.reservationId);
      if (outcome === "failed") result.failedIds.push(candidate.reservationId);
    }

    if (result.expiredIds.length > 0 || result.failedIds.length > 0) {
      this.logger.report("Expiry sweep completed", {
        expired: result.expiredIds.length,
        failed: result.failedIds.length,
      });
    }
    return result;
  }

  getReservation(reservationId: string): Promise<Reservation | null> {
    return this.store.get(reservationId);
  }

  findActiveForOrder(orderId: string): Promise<Reservation | null> {
    return this.store.findActiveForOrder(orderId);
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private singleFlight(
    orderId: string,
    run: () => Promise<AllocationResult>
  ): Promise<AllocationResult> {
    const existing = this.inFlight.get(orderId);
    if (existing) {
      this.logger.debug("Joining in-flight allocation", { orderId });
      return existing;
    }
    const promise = run().finally(() => {
      this.inFlight.delete(orderId);
    });
    this.inFlight.set(orderId, promise);
    return promise;
  }

  private async tryCandidates(
    order: FulfillmentOrder,
    ranking: readonly RankedCandidate[],
    signal: AbortSignal | undefined
  ): Promise<AllocationResult> {
    const reasons: AllocationFailureReason[] = [];
    const allocationId = this.generateAllocationId();
    const items = order.lines.map((line) => ({
      productId: line.productId,
      size: line.size,
      quantity: line.quantity,
    }));

    for (const candidate of ranking) {
      if (signal?.aborted) {
        return this.cancelled(order.orderId);
      }

      const { vendorId, locationId } = candidate;
      const idempotencyKey = idempotencyKeyFor(order.orderId, vendorId, locationId, allocationId);
      const createdAt = this.now();
      const expiresAt = createdAt + this.ttlMs;

      let outcome: HoldOutcome;
      try {
        outcome = await this.resilience.execute(
          INVENTORY_TARGET,
          (callSignal) =>
            this.inventory.reserve(
              { orderId: order.orderId, vendorId, locationId, items, expiresAt, idempotencyKey },
              callSignal
            ),
          // Inventory may commit the hold even if the caller aborts mid-call; such a hold is released below
          { signal, letAttemptFinish: true }
        );
      } catch (error) {
        if (error instanceof OperationCancelledError) {
          this.logger.info("Allocation cancelled during reserve call", {
            orderId: order.orderId,
            vendorId,
            idempotencyKey,
          });
          return this.cancelled(order.orderId);
        }
        reasons.push(this.classifyFailure(order.orderId, candidate, error));
        continue;
      }

      if (outcome.status === "rejected") {
        this.logger.info("Vendor rejected reservation", {
          orderId: order.orderId,
          vendorId,
          locationId,
          reason: outcome.reason,
        });
        reasons.push({ vendorId, locationId, kind: "rejected", detail: outcome.reason });
        continue;
      }

      if (signal?.aborted) {
        await this.compensate(outcome.reservationId, order.orderId);
        return this.cancelled(order.orderId);
      }

      const reservation: Reservation = {
        reservationId: outcome.reservationId,
        orderId: order.orderId,
        vendorId,
        locationId,
        items,
        state: reservationFSM.initial,
        createdAt,
        expiresAt,
        updatedAt: createdAt,
        version: 1,
        idempotencyKey,
      };
      try {
        await this.store.insert(reservation);
      } catch (error) {
        const detail = describeError(error);
        this.logger.error("Could not record accepted hold", {
          orderId: order.orderId,
          vendorId,
          reservationId: reservation.reservationId,
          error: detail,
        });
        await this.compensate(reservation.reservationId, order.orderId);
        reasons.push({ vendorId, locationId, kind: "error", detail });
        continue;
      }

      this.logger.info("Stock reserved", {
        orderId: order.orderId,
        vendorId,
        locationId,
        reservationId: reservation.reservationId,
        attempts: reasons.length + 1,
      });
      await this.emit(FULFILLMENT_EVENTS.ORDER_RESERVED, {
        orderId: order.orderId,
        vendorId,
        locationId,
        reservationId: reservation.reservationId,
        expiresAt: new Date(expiresAt).toISOString(),
        timestamp: this.timestamp(),
      });
      return { status: "reserved", reservation, reused: false, attempts: reasons.length + 1, reasons };
    }

    this.logger.error("Allocation failed at every candidate", {
      orderId: order.orderId,
      reasons: reasons.map((reason) => `${reason.vendorId}:${reason.kind}`),
    });
    await this.emit(FULFILLMENT_EVENTS.ALLOCATION_FAILED, {
      orderId: order.orderId,
      code: "ALLOCATION_FAILED",
      reasons,
      timestamp: this.timestamp(),
    });
    return { status: "failed", code: "ALLOCATION_FAILED", orderId: order.orderId, reasons };
  }

  private classifyFailure(
    orderId: string,
    candidate: RankedCandidate,
    error: unknown
  ): AllocationFailureReason {
    const { vendorId, locationId } = candidate;
    const detail = describeError(error);

    if (error instanceof CircuitOpenError) {
      this.logger.warn("Inventory circuit open, skipping candidate (sustained outage)", {
        orderId,
        vendorId,
        retryAfterMs: error.retryAfterMs,
      });
      return { vendorId, locationId, kind: "circuit-open", detail };
    }
    if (error instanceof ExhaustedRetriesError) {
      this.logger.warn("Inventory unavailable after retries, trying next candidate", {
        orderId,
        vendorId,
        attempts: error.attempts,
      });
      return { vendorId, locationId, kind: "unavailable", detail };
    }
    this.logger.error("Reserve call failed", { orderId, vendorId, error: detail });
    return { vendorId, locationId, kind: "error", detail };
  }

  /**
   * Release a hold that was accepted but will not be kept. The hold still
   * expires at the collaborator if this fails.
   */
  private async compensate(reservationId: string, orderId: string): Promise<void> {
    try {
      await this.releaseHold(reservationId);
      this.logger.info("Released unkept hold", { orderId, reservationId });
    } catch (error) {
      this.logger.error("Could not release unkept hold", {
        orderId,
        reservationId,
        error: describeError(error),
      });
    }
  }

  private async releaseHold(reservationId: string): Promise<void> {
    const outcome = await this.resilience.execute(INVENTORY_TARGET, (signal) =>
      this.inventory.release(reservationId, signal)
    );
    if (outcome.status === "not-found") {
      this.logger.debug("Hold already gone at inventory", { reservationId });
    }
  }

  private async dropInactiveVendors(
    candidates: VendorCandidate[],
    signal: AbortSignal | undefined
  ): Promise<{ active: VendorCandidate[]; inactive: ExcludedCandidate[] }> {
    const vendorIds = [...new Set(candidates.map((candidate) => candidate.vendorId))];
    const inactiveVendors = new Set<string>();

    await Promise.all(
      vendorIds.map(async (vendorId) => {
        try {
          const availability = await this.resilience.execute(
            CATALOG_TARGET,
            (callSignal) => this.catalog.getAvailability(vendorId, callSignal),
            { signal }
          );
          if (!availability.available) {
            inactiveVendors.add(vendorId);
          }
        } catch (error) {
          if (error instanceof OperationCancelledError) {
            throw error;
          }
          // Unknown availability keeps the vendor; the reserve call decides
          this.logger.warn("Availability lookup failed, keeping vendor", {
            vendorId,
            error: describeError(error),
          });
        }
      })
    );

    const active: VendorCandidate[] = [];
    const inactive: ExcludedCandidate[] = [];
    for (const candidate of candidates) {
      if (inactiveVendors.has(candidate.vendorId)) {
        inactive.push({
          vendorId: candidate.vendorId,
          locationId: candidate.locationId,
          reason: "inactive",
        });
      } else {
        active.push(candidate);
      }
    }
    return { active, inactive };
  }

  private async transition(reservation: Reservation, to: ReservationState): Promise<Reservation> {
    reservationFSM.assertTransition(reservation.state, to);
    return this.store.update(reservation.reservationId, reservation.version, {
      state: to,
      updatedAt: this.now(),
    });
  }

  private reused(reservation: Reservation): AllocationResult {
    this.logger.debug("Order already holds a reservation", {
      orderId: reservation.orderId,
      reservationId: reservation.reservationId,
      state: reservation.state,
    });
    return { status: "reserved", reservation, reused: true, attempts: 0, reasons: [] };
  }

  private cancelled(orderId: string): AllocationResult {
    return { status: "cancelled", orderId };
  }

  /**
   * Publish without letting a publisher fault undo a completed state change.
   */
  private async emit(eventType: string, payload: UnknownRecord): Promise<void> {
    try {
      await this.publisher.publish(eventType, payload);
    } catch (error) {
      this.logger.error("Event publication failed", {
        eventType,
        orderId: payload["orderId"],
        error: describeError(error),
      });
    }
  }

  private timestamp(): string {
    return new Date(this.now()).toISOString();
  }
}

function notFound(reservationId: string): {
  status: "error";
  code: "RESERVATION_NOT_FOUND";
  message: string;
} {
  return {
    status: "error",
    code: "RESERVATION_NOT_FOUND",
    message: `Reservation ${reservationId} not found`,
  };
}

function alreadyExpired(reservationId: string): {
  status: "error";
  code: "RESERVATION_ALREADY_EXPIRED";
  message: string;
} {
  return {
    status: "error",
    code: "RESERVATION_ALREADY_EXPIRED",
    message: `Reservation ${reservationId} has expired`,
  };
}
