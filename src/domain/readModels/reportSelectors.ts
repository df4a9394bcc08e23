import type { AggregatedPlayer } from "../players/types.js";
import type { CampaignDays, CompletionStatus } from "../campaigns/types.js";
import { evaluateCompletion } from "../campaigns/completion.js";
import type { ISODate } from "../shared/dates.js";
import { alignSeries } from "../steps/normalize.js";
import type { StepValue } from "../steps/types.js";
import { compareRosterIds, type RosterEntry, type RosterId } from "../roster/types.js";

export type ReportRow = {
  id: RosterId;
  username: string;
  series: StepValue[]; // aligned with campaignDays
  status: CompletionStatus;
};

export type RosterReport = {
  campaignDays: CampaignDays;
  rows: ReportRow[];
  missingUsers: string[]; // roster names with no fetched player
};

/**
 * Joins the roster to the aggregated players and evaluates each one.
 * Rows are ordered by roster ID, then username.
 */
export function selectRosterReport(
  players: ReadonlyMap<string, AggregatedPlayer>,
  roster: readonly RosterEntry[],
  campaignDays: CampaignDays,
  stepTarget: number,
  evaluationDate: ISODate
): RosterReport {
  const rows: ReportRow[] = [];
  const missingUsers: string[] = [];

  for (const entry of roster) {
    const player = players.get(entry.username);
    if (!player) {
      missingUsers.push(entry.username);
      continue;
    }

    const series = alignSeries(player.series, campaignDays.length);
    rows.push({
      id: entry.id,
      username: entry.username,
      series,
      status: evaluateCompletion(series, campaignDays, stepTarget, evaluationDate)
    });
  }

  rows.sort((a, b) => compareRosterIds(a.id, b.id) || a.username.localeCompare(b.username));

  return { campaignDays, rows, missingUsers };
}
