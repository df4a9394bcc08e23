import { describe, it, expect } from "vitest";
import { evaluateCompletion } from "../src/domain/campaigns/completion.js";
import { CAPPED, MISSING, type StepValue } from "../src/domain/steps/types.js";

const days = ["2026-01-01", "2026-01-02", "2026-01-03"];
const n = (steps: number): StepValue => ({ kind: "NUMERIC", steps });

describe("Completion evaluation", () => {
  const series = [n(12000), n(8000), MISSING];

  it("is partial with the exact deficit once all days are due", () => {
    expect(evaluateCompletion(series, days, 10000, "2026-01-03")).toEqual({
      type: "PARTIAL",
      completedDays: 1,
      requiredDays: 3
    });
  });

  it("only requires days up to the evaluation date", () => {
    expect(evaluateCompletion(series, days, 10000, "2026-01-01")).toEqual({
      type: "COMPLETE",
      requiredDays: 1
    });
    expect(evaluateCompletion(series, days, 10000, "2026-01-02")).toEqual({
      type: "PARTIAL",
      completedDays: 1,
      requiredDays: 2
    });
  });

  it("is not yet due before the first campaign day, whatever the series holds", () => {
    expect(evaluateCompletion([n(20000), CAPPED, n(15000)], days, 10000, "2025-12-31")).toEqual({
      type: "NOT_YET_DUE"
    });
    expect(evaluateCompletion([MISSING, MISSING, MISSING], days, 10000, "2025-12-31")).toEqual({
      type: "NOT_YET_DUE"
    });
  });

  it("requires every day after the campaign ends", () => {
    expect(evaluateCompletion([n(10000), n(10001), CAPPED], days, 10000, "2026-02-15")).toEqual({
      type: "COMPLETE",
      requiredDays: 3
    });
  });

  it("counts a capped day as meeting any target up to the cap", () => {
    expect(evaluateCompletion([CAPPED, CAPPED, CAPPED], days, 30000, "2026-01-03").type).toBe("COMPLETE");
    expect(evaluateCompletion([CAPPED, CAPPED, CAPPED], days, 30001, "2026-01-03")).toEqual({
      type: "PARTIAL",
      completedDays: 0,
      requiredDays: 3
    });
  });

  it("treats the target as inclusive", () => {
    expect(evaluateCompletion([n(9999)], ["2026-01-01"], 10000, "2026-01-01")).toEqual({
      type: "PARTIAL",
      completedDays: 0,
      requiredDays: 1
    });
    expect(evaluateCompletion([n(10000)], ["2026-01-01"], 10000, "2026-01-01").type).toBe("COMPLETE");
  });

  it("rejects series that are not aligned with the campaign days", () => {
    expect(() => evaluateCompletion([n(1)], days, 10000, "2026-01-03")).toThrow(
      "Series has 1 days but campaign has 3."
    );
  });

  it("rejects a non-positive target", () => {
    expect(() => evaluateCompletion(series, days, 0, "2026-01-03")).toThrow(
      "Step target must be a positive integer."
    );
  });
});
