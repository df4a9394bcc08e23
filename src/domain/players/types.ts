import type { ISODate } from "../shared/dates.js";
import type { RawSteps, StepValue } from "../steps/types.js";

export type RawStepEntry = {
  day: ISODate;
  steps: RawSteps;
};

export type RawPlayerRecord = {
  username: string | null; // null when the API record could not be decoded
  stepEntries: RawStepEntry[];
};

export type AggregatedPlayer = {
  username: string;
  series: StepValue[];         // one entry per campaign day
  totalCompletedDays: number;  // NUMERIC(n > 0) or CAPPED
  highestSteps: number;        // largest literal count seen, 0 when none
};

export type SkippedRecord = {
  index: number; // 1-based position in the fetched list
  reason: string;
};
