import { ascending } from "d3-array";

export type SelectionState =
  | { status: "unavailable" }
  | { status: "awaiting-input"; choices: readonly string[] }
  | { status: "retry"; choices: readonly string[]; rejected: string }
  | { status: "resolved"; choices: readonly string[]; key: string };

export function startSelection(keys: Iterable<string>): SelectionState {
  const choices = Array.from(new Set(keys)).sort(ascending);
  if (choices.length === 0) {
    return { status: "unavailable" };
  }
  return { status: "awaiting-input", choices };
}

/**
 * Validates one answer. Only an exact match (after trimming) against a
 * presented choice resolves; anything else moves to `retry`. Terminal states
 * are returned unchanged.
 */
export function submitSelection(state: SelectionState, input: string): SelectionState {
  if (state.status === "unavailable" || state.status === "resolved") {
    return state;
  }
  const answer = input.trim();
  if (state.choices.includes(answer)) {
    return { status: "resolved", choices: state.choices, key: answer };
  }
  return { status: "retry", choices: state.choices, rejected: answer };
}

export function isSettled(state: SelectionState): boolean {
  return state.status === "resolved" || state.status === "unavailable";
}

export function describeChoices(state: SelectionState, label = "option"): string[] {
  if (state.status === "unavailable") {
    return [`No ${label} values available.`];
  }
  return [`Available ${label} values:`, ...state.choices.map((choice) => `  - ${choice}`)];
}

export function describeRejection(state: SelectionState, label = "option"): string | null {
  if (state.status !== "retry") {
    return null;
  }
  return `"${state.rejected}" is not a known ${label}. Pick one of: ${state.choices.join(", ")}.`;
}
