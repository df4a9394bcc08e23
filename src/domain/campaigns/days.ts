import type { RawPlayerRecord } from "../players/types.js";
import type { CampaignDays } from "./types.js";
import { toISODate } from "../shared/dates.js";

function hasUsableDays(p: RawPlayerRecord): boolean {
  return p.stepEntries.length > 0 && p.stepEntries.every((e) => toISODate(e.day).length > 0);
}

/**
 * Campaign days come from the first player whose step entries all carry a
 * day; every player has one entry per campaign day in the same order, so
 * day positions line up with series positions.
 * Returns an empty list when no player qualifies.
 */
export function campaignDaysFrom(players: readonly RawPlayerRecord[]): CampaignDays {
  const source = players.find(hasUsableDays);
  if (!source) return [];
  return source.stepEntries.map((e) => toISODate(e.day));
}
