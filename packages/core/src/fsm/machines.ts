import { defineFSM } from "./defineFSM.js";

export type ReservationState = "pending" | "confirmed" | "released" | "expired";

export const reservationFSM = defineFSM<ReservationState>("reservation", {
  initial: "pending",
  transitions: {
    pending: ["confirmed", "released", "expired"],
    confirmed: [],
    released: [],
    expired: [],
  },
});

export type CircuitState = "closed" | "open" | "half-open";

export const circuitFSM = defineFSM<CircuitState>("circuit", {
  initial: "closed",
  transitions: {
    closed: ["open"],
    open: ["half-open"],
    "half-open": ["closed", "open"],
  },
});

/**
 * `failed` means the reconnect ceiling was reached; the supervisor still
 * moves it back to `connecting` on its recovery interval.
 */
export type ConnectionState = "disconnected" | "connecting" | "connected" | "failed";

export const connectionFSM = defineFSM<ConnectionState>("connection", {
  initial: "disconnected",
  transitions: {
    disconnected: ["connecting"],
    connecting: ["connected", "failed", "disconnected"],
    connected: ["disconnected"],
    failed: ["connecting", "disconnected"],
  },
});
