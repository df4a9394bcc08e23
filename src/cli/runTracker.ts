import type { CampaignCode, CampaignDays, GameInfo } from "../domain/campaigns/types.js";
import { campaignDaysFrom } from "../domain/campaigns/days.js";
import { fetchAllPlayers } from "../domain/fetching/paginator.js";
import type { RetryPolicy, Sleep } from "../domain/fetching/retry.js";
import type { FetchProgressEvent } from "../domain/fetching/types.js";
import { aggregate } from "../domain/players/aggregator.js";
import type { SkippedRecord } from "../domain/players/types.js";
import { selectRosterReport, type ReportRow } from "../domain/readModels/reportSelectors.js";
import { localISODate } from "../domain/shared/dates.js";
import { readRoster } from "../files/rosterFile.js";
import { writeReportCsv } from "../files/reportFile.js";
import type { MoonwalkClient } from "../infra/moonwalk/moonwalkClient.js";
import type { Logger } from "../infra/logger.js";
import { formatCount } from "../report/format.js";
import { renderGrid, toReportTable } from "../report/table.js";

export type TrackerDeps = {
  client: MoonwalkClient;
  logger: Logger;
  rosterPath: string;
  outputDir: string;
  now?: () => Date;
  sleep?: Sleep;
  retry?: RetryPolicy;
  write?: (text: string) => void;
};

export type RunSummary = {
  gameInfo: GameInfo;
  campaignDays: CampaignDays;
  fetchedPlayers: number;
  possiblyPartial: boolean;
  rows: ReportRow[];
  missingUsers: string[];
  skippedRecords: SkippedRecord[];
  exportPath: string | null;
};

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function progressLogger(logger: Logger): (e: FetchProgressEvent) => void {
  return (e) => {
    switch (e.type) {
      case "PAGE_FETCHED":
        logger.info({ offset: e.offset, count: e.count, total: e.totalSoFar }, "Fetched player page");
        return;
      case "PAGE_RETRY":
        logger.warn({ offset: e.offset, attempt: e.attempt, error: e.error }, "Page fetch failed, retrying");
        return;
      case "PAGE_EMPTY":
        logger.warn({ offset: e.offset }, "No players returned for page");
        return;
      case "END_OF_DATA":
        logger.info({ total: e.total }, "Reached the end of the player list");
        return;
      case "RETRIES_EXHAUSTED":
        logger.warn({ offset: e.offset, error: e.error, total: e.total }, "Page fetch retries exhausted");
        return;
    }
  };
}

/** Overview endpoint first, campaign web page second. */
async function loadGameInfo(client: MoonwalkClient, code: CampaignCode, logger: Logger): Promise<GameInfo> {
  try {
    return await client.fetchCampaignOverview(code);
  } catch (err) {
    logger.warn({ err: errorMessage(err) }, "Campaign overview failed, trying the campaign page");
  }

  try {
    return await client.fetchCampaignFromWeb(code);
  } catch (err) {
    throw new Error(`Could not load campaign metadata for ${code}: ${errorMessage(err)}`);
  }
}

export async function runTracker(campaignCode: CampaignCode, deps: TrackerDeps): Promise<RunSummary> {
  const { client, logger } = deps;
  const now = deps.now ?? (() => new Date());
  const write = deps.write ?? ((text: string) => process.stdout.write(text + "\n"));

  const roster = readRoster(deps.rosterPath);
  logger.info({ users: roster.map((r) => r.username) }, "Roster loaded");

  const gameInfo = await loadGameInfo(client, campaignCode, logger);
  logger.info(
    {
      name: gameInfo.name,
      deposit: `${gameInfo.depositAmount} ${gameInfo.tokenSymbol}`,
      period: `${gameInfo.startDate} to ${gameInfo.endDate}`,
      stepTarget: gameInfo.stepTarget,
      totalPlayers: gameInfo.totalPlayers
    },
    "Campaign loaded"
  );

  const { players, possiblyPartial } = await fetchAllPlayers(client, campaignCode, {
    sleep: deps.sleep,
    retry: deps.retry,
    onProgress: progressLogger(logger)
  });
  if (possiblyPartial) {
    logger.warn({ fetched: players.length }, "Player list may be incomplete");
  }

  const campaignDays = campaignDaysFrom(players);
  if (campaignDays.length === 0) {
    throw new Error(`No campaign days could be derived from the player list of ${campaignCode}.`);
  }

  const skippedRecords: SkippedRecord[] = [];
  const aggregated = aggregate(players, {
    onSkip: (s) => {
      skippedRecords.push(s);
      logger.warn({ index: s.index, reason: s.reason }, "Skipped player record");
    }
  });
  logger.info({ players: aggregated.size }, "Aggregated player data");

  const report = selectRosterReport(
    aggregated,
    roster,
    campaignDays,
    gameInfo.stepTarget,
    localISODate(now())
  );
  for (const username of report.missingUsers) {
    logger.warn({ username }, "Roster user not found among players");
  }

  let exportPath: string | null = null;
  if (report.rows.length === 0) {
    logger.warn("No roster users found among players; nothing exported");
  } else {
    const table = toReportTable(report);
    write(`Step Target: ${formatCount(gameInfo.stepTarget)} steps`);
    write(renderGrid(table));
    exportPath = writeReportCsv(deps.outputDir, campaignCode, gameInfo, table, now());
    logger.info({ exportPath, rows: report.rows.length }, "Report saved");
  }

  return {
    gameInfo,
    campaignDays,
    fetchedPlayers: players.length,
    possiblyPartial,
    rows: report.rows,
    missingUsers: report.missingUsers,
    skippedRecords,
    exportPath
  };
}
