import fs from "node:fs";
import path from "node:path";
import * as XLSX from "xlsx";
import type { GameInfo } from "../domain/campaigns/types.js";
import { fileStamp } from "../domain/shared/dates.js";
import type { ReportTable } from "../report/table.js";
import { formatCount } from "../report/format.js";

const BOM = "\uFEFF";

export function reportFileName(code: string, now: Date): string {
  return `our_players_${code}_${fileStamp(now)}.csv`;
}

/** Campaign metadata block that precedes the player rows. */
export function gameInfoRows(info: GameInfo): string[][] {
  return [
    ["Info", "Value"],
    ["Game Information", ""],
    ["Game Code", info.code],
    ["Game Name", info.name],
    ["Game Link", info.link],
    ["Deposit Amount", `${info.depositAmount} ${info.tokenSymbol}`],
    ["Start Date", info.startDate],
    ["End Date", info.endDate],
    ["Step Target", formatCount(info.stepTarget)],
    ["Total Players", String(info.totalPlayers)],
    ["", ""],
    ["Player Data", ""]
  ];
}

export function reportCsv(info: GameInfo, table: ReportTable): string {
  const sheet = XLSX.utils.aoa_to_sheet([...gameInfoRows(info), table.headers, ...table.rows]);
  return XLSX.utils.sheet_to_csv(sheet);
}

/**
 * Writes the export as UTF-8 with a BOM so spreadsheet apps keep
 * non-ASCII names intact. Returns the file path.
 */
export function writeReportCsv(
  outputDir: string,
  campaignCode: string,
  info: GameInfo,
  table: ReportTable,
  now: Date = new Date()
): string {
  fs.mkdirSync(outputDir, { recursive: true });
  const filePath = path.join(outputDir, reportFileName(campaignCode, now));
  fs.writeFileSync(filePath, BOM + reportCsv(info, table), "utf8");
  return filePath;
}
