export type { FSM, FSMDefinition } from "./types.js";
export { FSMTransitionError } from "./types.js";
export { defineFSM } from "./defineFSM.js";
export {
  reservationFSM,
  circuitFSM,
  connectionFSM,
  type ReservationState,
  type CircuitState,
  type ConnectionState,
} from "./machines.js";
