import { describe, expect, it } from "vitest";

import {
  describeChoices,
  describeRejection,
  isSettled,
  startSelection,
  submitSelection,
} from "../../src/lib/animals/selection.js";

describe("selection state machine", () => {
  it("is unavailable without keys", () => {
    const state = startSelection([]);

    expect(state).toEqual({ status: "unavailable" });
    expect(isSettled(state)).toBe(true);
    expect(describeChoices(state, "skin type")).toEqual(["No skin type values available."]);
  });

  it("presents choices sorted ascending", () => {
    const state = startSelection(["Scales", "Fur", "Unknown", "Fur"]);

    expect(state).toEqual({ status: "awaiting-input", choices: ["Fur", "Scales", "Unknown"] });
    expect(describeChoices(state, "skin type")).toEqual([
      "Available skin type values:",
      "  - Fur",
      "  - Scales",
      "  - Unknown",
    ]);
  });

  it("retries on anything but an exact match", () => {
    let state = startSelection(["Fur", "Scales"]);

    state = submitSelection(state, "fur");
    expect(state).toEqual({ status: "retry", choices: ["Fur", "Scales"], rejected: "fur" });
    expect(isSettled(state)).toBe(false);
    expect(describeRejection(state, "skin type")).toBe('"fur" is not a known skin type. Pick one of: Fur, Scales.');

    state = submitSelection(state, "Scale");
    expect(state.status).toBe("retry");

    state = submitSelection(state, "  Scales ");
    expect(state).toEqual({ status: "resolved", choices: ["Fur", "Scales"], key: "Scales" });
    expect(describeRejection(state)).toBeNull();
  });

  it("ignores input once resolved", () => {
    const resolved = submitSelection(startSelection(["Fur"]), "Fur");
    expect(submitSelection(resolved, "Scales")).toBe(resolved);
  });
});
