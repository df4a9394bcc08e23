import { CAPPED, MISSING, STEP_CAP, type RawSteps, type StepValue } from "./types.js";

const OVERFLOW_MARKER = "k+";

function isOverflowMarker(raw: RawSteps): raw is string {
  return typeof raw === "string" && raw.includes(OVERFLOW_MARKER);
}

export function normalizeSteps(raw: RawSteps): StepValue {
  if (isOverflowMarker(raw)) return CAPPED;
  if (typeof raw !== "number" || !Number.isFinite(raw) || raw <= 0) return MISSING;
  if (raw >= STEP_CAP) return CAPPED;
  return { kind: "NUMERIC", steps: raw };
}

/**
 * Count used when comparing against a target.
 * CAPPED is a floor: the true count is at least STEP_CAP.
 */
export function comparableSteps(v: StepValue): number {
  switch (v.kind) {
    case "NUMERIC":
      return v.steps;
    case "CAPPED":
      return STEP_CAP;
    case "MISSING":
      return 0;
  }
}

export function isCompletedDay(v: StepValue): boolean {
  return v.kind === "CAPPED" || (v.kind === "NUMERIC" && v.steps > 0);
}

/** Pads with MISSING or truncates so the series lines up with `length` days. */
export function alignSeries(series: readonly StepValue[], length: number): StepValue[] {
  const out = series.slice(0, length);
  while (out.length < length) out.push(MISSING);
  return out;
}
