export {
  idempotencyKeyFor,
  DEFAULT_RESERVATION_TTL_MS,
  type Reservation,
  type ReservationItem,
  type AllocationFailureKind,
  type AllocationFailureReason,
  type AllocationResult,
  type AllocationReservedResult,
  type AllocationFailedResult,
  type AllocationRejectedResult,
  type AllocationCancelledResult,
  type ReservationErrorCode,
  type ReservationErrorResult,
  type ConfirmResult,
  type ReleaseResult,
  type ReleaseForOrderResult,
  type ExpireStaleResult,
} from "./types.js";
export type {
  InventoryClient,
  VendorCatalog,
  VendorAvailability,
  HoldRequest,
  HoldOutcome,
  ConfirmOutcome,
  ReleaseOutcome,
} from "./collaborators.js";
export {
  InMemoryReservationStore,
  ReservationStoreError,
  type ReservationStore,
  type ReservationUpdate,
} from "./store.js";
export { KeyedMutex } from "./keyed-mutex.js";
export {
  StockReservationCoordinator,
  INVENTORY_TARGET,
  CATALOG_TARGET,
  type ReservationCoordinatorOptions,
  type AllocateOptions,
} from "./coordinator.js";
