import type { CompletionStatus } from "./types.js";
import type { ISODate } from "../shared/dates.js";
import { isOnOrBefore } from "../shared/dates.js";
import type { StepValue } from "../steps/types.js";
import { comparableSteps } from "../steps/normalize.js";

/**
 * Classifies a player's series against the daily step target.
 *
 * Only days on or before `evaluationDate` are required. A day counts as met
 * when its comparable count reaches `stepTarget`; MISSING compares as 0 and
 * CAPPED as the cap, so a capped day meets any target up to the cap.
 *
 * `series` must be aligned with `campaignDays` (see alignSeries).
 */
export function evaluateCompletion(
  series: readonly StepValue[],
  campaignDays: readonly ISODate[],
  stepTarget: number,
  evaluationDate: ISODate
): CompletionStatus {
  if (series.length !== campaignDays.length) {
    throw new Error(
      `Series has ${series.length} days but campaign has ${campaignDays.length}.`
    );
  }
  if (!Number.isInteger(stepTarget) || stepTarget <= 0) {
    throw new Error("Step target must be a positive integer.");
  }

  const requiredDays = campaignDays.filter((d) => isOnOrBefore(d, evaluationDate)).length;
  if (requiredDays === 0) return { type: "NOT_YET_DUE" };

  let completedDays = 0;
  for (let i = 0; i < requiredDays; i++) {
    if (comparableSteps(series[i]) >= stepTarget) completedDays++;
  }

  if (completedDays === requiredDays) return { type: "COMPLETE", requiredDays };
  return { type: "PARTIAL", completedDays, requiredDays };
}
