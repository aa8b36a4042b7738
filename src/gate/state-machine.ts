import { VALID_TRANSITIONS, type DecisionState, type DecisionTransition } from "./types.js";

/** Check if a state transition is valid */
export function isValidTransition(from: DecisionState, to: DecisionState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function isTerminal(state: DecisionState): boolean {
  return VALID_TRANSITIONS[state].length === 0;
}

/** Append a transition, rejecting any move the table does not allow. */
export function advance(history: DecisionTransition[], to: DecisionState, at: string): DecisionTransition[] {
  const current = history[history.length - 1];
  if (!current) {
    if (to !== "RECEIVED") throw new Error(`Decision must start at RECEIVED, not ${to}`);
    return [{ state: to, at }];
  }
  if (!isValidTransition(current.state, to)) {
    throw new Error(`Invalid decision transition ${current.state} → ${to}`);
  }
  return [...history, { state: to, at }];
}

/** Walk a path of states in order from an empty history. */
export function walk(path: readonly DecisionState[], at: string): DecisionTransition[] {
  let history: DecisionTransition[] = [];
  for (const state of path) history = advance(history, state, at);
  return history;
}
