/** Reporting threshold. The API stops reporting exact counts at this value. */
export const STEP_CAP = 30000;

export type StepValue =
  | { kind: "MISSING" }
  | { kind: "CAPPED" }
  | { kind: "NUMERIC"; steps: number };

/** Raw `steps` field as the API sends it: a count, a label such as "30k+", or nothing. */
export type RawSteps = number | string | null | undefined;

export const MISSING: StepValue = { kind: "MISSING" };
export const CAPPED: StepValue = { kind: "CAPPED" };
