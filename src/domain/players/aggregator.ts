import type { AggregatedPlayer, RawPlayerRecord, SkippedRecord } from "./types.js";
import { isCompletedDay, normalizeSteps } from "../steps/normalize.js";

export type AggregateOptions = {
  onSkip?: (skipped: SkippedRecord) => void;
};

/**
 * Builds one AggregatedPlayer per username.
 * Records without a username are reported through `onSkip` and left out;
 * a repeated username replaces the earlier record.
 */
export function aggregate(
  rawPlayers: readonly RawPlayerRecord[],
  opts: AggregateOptions = {}
): Map<string, AggregatedPlayer> {
  const out = new Map<string, AggregatedPlayer>();

  rawPlayers.forEach((record, i) => {
    const username = record.username?.trim() ?? "";
    if (!username) {
      opts.onSkip?.({ index: i + 1, reason: "no username" });
      return;
    }

    const series = record.stepEntries.map((e) => normalizeSteps(e.steps));

    let highestSteps = 0;
    for (const e of record.stepEntries) {
      if (typeof e.steps === "number" && Number.isFinite(e.steps) && e.steps > highestSteps) {
        highestSteps = e.steps;
      }
    }

    out.set(username, {
      username,
      series,
      totalCompletedDays: series.filter(isCompletedDay).length,
      highestSteps
    });
  });

  return out;
}
