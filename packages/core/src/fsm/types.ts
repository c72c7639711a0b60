/**
 * ## FSM Types
 *
 * State machines make lifecycle transitions explicit. Reservations, circuit
 * breakers and broker connections each declare one and assert every
 * transition at runtime.
 *
 * | Type | Purpose |
 * |------|---------|
 * | `FSMDefinition<TState>` | initial state + transition map |
 * | `FSM<TState>` | instance with validation methods |
 * | `FSMTransitionError` | thrown for a transition the map does not allow |
 */

import { FulfillmentError } from "../errors/FulfillmentError.js";

export interface FSMDefinition<TState extends string> {
  /** State a new instance starts in */
  initial: TState;

  /**
   * Map of state to allowed target states.
   * Empty array = terminal state.
   */
  transitions: Record<TState, readonly TState[]>;
}

export interface FSM<TState extends string> {
  readonly definition: FSMDefinition<TState>;
  readonly initial: TState;

  canTransition(from: TState, to: TState): boolean;

  /**
   * @throws FSMTransitionError if the transition is not allowed
   */
  assertTransition(from: TState, to: TState): void;

  validTransitions(from: TState): readonly TState[];

  /** True when the state has no outgoing transitions */
  isTerminal(state: TState): boolean;

  isValidState(state: string): state is TState;
}

export class FSMTransitionError extends FulfillmentError<"FSM_INVALID_TRANSITION"> {
  readonly machine: string;
  readonly from: string;
  readonly to: string;
  readonly validTransitions: readonly string[];

  constructor(machine: string, from: string, to: string, validTransitions: readonly string[]) {
    const validStr = validTransitions.length > 0 ? validTransitions.join(", ") : "none (terminal)";
    super(
      "FSM_INVALID_TRANSITION",
      `${machine}: invalid transition from "${from}" to "${to}". Valid transitions: ${validStr}`,
      { machine, from, to, validTransitions: [...validTransitions] }
    );
    this.name = "FSMTransitionError";
    this.machine = machine;
    this.from = from;
    this.to = to;
    this.validTransitions = validTransitions;
  }
}
