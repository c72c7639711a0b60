/**
 * ## defineFSM
 *
 * Creates an FSM from a definition with pre-computed state lookup.
 *
 * @example
 * ```typescript
 * type Light = "green" | "amber" | "red";
 *
 * const lightFSM = defineFSM<Light>("light", {
 *   initial: "red",
 *   transitions: { red: ["green"], green: ["amber"], amber: ["red"] },
 * });
 *
 * lightFSM.assertTransition("red", "amber"); // throws FSMTransitionError
 * ```
 */

import type { FSM, FSMDefinition } from "./types.js";
import { FSMTransitionError } from "./types.js";

export function defineFSM<TState extends string>(
  name: string,
  definition: FSMDefinition<TState>
): FSM<TState> {
  const validStates = new Set<string>(Object.keys(definition.transitions));

  return {
    definition,
    initial: definition.initial,

    canTransition(from: TState, to: TState): boolean {
      return definition.transitions[from].includes(to);
    },

    assertTransition(from: TState, to: TState): void {
      const allowed = definition.transitions[from];
      if (!allowed.includes(to)) {
        throw new FSMTransitionError(name, from, to, allowed);
      }
    },

    validTransitions(from: TState): readonly TState[] {
      return definition.transitions[from];
    },

    isTerminal(state: TState): boolean {
      return definition.transitions[state].length === 0;
    },

    isValidState(state: string): state is TState {
      return validStates.has(state);
    },
  };
}
