import { describe, expect, it } from "vitest";
import { EXIT_CODES, exitCodeForOutcome, isRunOutcome, outcomeForVerdict, RUN_OUTCOMES } from "../src/outcome.js";

describe("outcome", () => {
  it("maps every outcome to a distinct exit code", () => {
    expect(RUN_OUTCOMES.map(exitCodeForOutcome)).toEqual([0, 1, 2, 3]);
    expect(new Set(Object.values(EXIT_CODES)).size).toBe(RUN_OUTCOMES.length);
  });

  it("derives the outcome from the audit verdict", () => {
    expect(outcomeForVerdict({ passed: true })).toBe("done");
    expect(outcomeForVerdict({ passed: false })).toBe("verification_failed");
    expect(outcomeForVerdict(null)).toBe("verification_failed");
  });

  it("recognises terminal statuses", () => {
    expect(isRunOutcome("needs_clarification")).toBe(true);
    expect(isRunOutcome("running")).toBe(false);
  });
});
