import { describe, expect, it } from "vitest";

import { InvalidTransitionError } from "../errors.ts";
import { allowedTransitions, assertTransition, canTransition, isEditable, isTerminal } from "./appointment-status.ts";

describe("appointment status lifecycle", () => {
  it("follows scheduled → confirmed → in_progress → completed", () => {
    expect(canTransition("scheduled", "confirmed")).toBe(true);
    expect(canTransition("confirmed", "in_progress")).toBe(true);
    expect(canTransition("in_progress", "completed")).toBe(true);
  });

  it("allows cancelling or a no-show only before the visit starts", () => {
    expect(allowedTransitions("scheduled")).toEqual(["confirmed", "cancelled", "no_show"]);
    expect(allowedTransitions("confirmed")).toEqual(["in_progress", "cancelled", "no_show"]);
    expect(canTransition("in_progress", "cancelled")).toBe(false);
  });

  it("does not skip steps", () => {
    expect(canTransition("scheduled", "completed")).toBe(false);
    expect(canTransition("scheduled", "in_progress")).toBe(false);
  });

  it("treats completed, cancelled and no_show as terminal", () => {
    expect(isTerminal("completed")).toBe(true);
    expect(isTerminal("cancelled")).toBe(true);
    expect(isTerminal("no_show")).toBe(true);
    expect(isTerminal("confirmed")).toBe(false);
    expect(allowedTransitions("cancelled")).toEqual([]);
  });

  it("throws InvalidTransitionError for a disallowed move", () => {
    expect(() => assertTransition("completed", "scheduled")).toThrow(InvalidTransitionError);
    expect(() => assertTransition("completed", "scheduled")).toThrow(
      "Cannot change appointment status from completed to scheduled",
    );
  });

  it("keeps only scheduled and confirmed appointments editable", () => {
    expect(isEditable("scheduled")).toBe(true);
    expect(isEditable("confirmed")).toBe(true);
    expect(isEditable("in_progress")).toBe(false);
    expect(isEditable("cancelled")).toBe(false);
  });
});
