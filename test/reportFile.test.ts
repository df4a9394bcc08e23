import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import * as XLSX from "xlsx";
import { reportCsv, reportFileName, writeReportCsv } from "../src/files/reportFile.js";
import type { GameInfo } from "../src/domain/campaigns/types.js";
import type { ReportTable } from "../src/report/table.js";

const info: GameInfo = {
  code: "camp1",
  name: "January Walk",
  depositAmount: 25,
  tokenSymbol: "USDT",
  startDate: "2026/01/02",
  endDate: "2026/01/08",
  stepTarget: 10000,
  totalPlayers: 57,
  link: "https://app.example.test/game/camp1"
};

const table: ReportTable = {
  headers: ["ID", "Username", "2026-01-02", "2026-01-03", "Task Status"],
  rows: [
    ["1", "张伟", "12,000", "30k+", "Complete"],
    ["2", "alice", "-", "8,000", "Failed(0/2)"]
  ]
};

/** Parses CSV text back into rows, trailing empty cells dropped. */
function readBack(csv: string): string[][] {
  const wb = XLSX.read(csv, { type: "string", raw: true });
  const rows = XLSX.utils.sheet_to_json<unknown[]>(wb.Sheets[wb.SheetNames[0]], {
    header: 1,
    defval: ""
  });
  return rows.map((r) => {
    const cells = r.map((c) => String(c));
    while (cells.length > 0 && cells[cells.length - 1] === "") cells.pop();
    return cells;
  });
}

describe("Report CSV", () => {
  it("starts with the campaign block", () => {
    const rows = readBack(reportCsv(info, table));

    expect(rows.slice(0, 10)).toEqual([
      ["Info", "Value"],
      ["Game Information"],
      ["Game Code", "camp1"],
      ["Game Name", "January Walk"],
      ["Game Link", "https://app.example.test/game/camp1"],
      ["Deposit Amount", "25 USDT"],
      ["Start Date", "2026/01/02"],
      ["End Date", "2026/01/08"],
      ["Step Target", "10,000"],
      ["Total Players", "57"]
    ]);
  });

  it("follows the block with the player table", () => {
    const rows = readBack(reportCsv(info, table));
    const at = rows.findIndex((r) => r[0] === "Player Data");

    expect(at).toBeGreaterThan(9);
    expect(rows.slice(at + 1)).toEqual([
      ["ID", "Username", "2026-01-02", "2026-01-03", "Task Status"],
      ["1", "张伟", "12,000", "30k+", "Complete"],
      ["2", "alice", "-", "8,000", "Failed(0/2)"]
    ]);
  });

  it("quotes values that contain commas", () => {
    expect(reportCsv(info, table)).toContain('"12,000"');
  });
});

describe("Report file", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "report-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("is named after the campaign and the local time", () => {
    expect(reportFileName("camp1", new Date(2026, 0, 3, 9, 5, 7))).toBe("our_players_camp1_20260103_090507.csv");
  });

  it("is written as UTF-8 with a byte-order mark", () => {
    const out = path.join(dir, "nested");
    const p = writeReportCsv(out, "camp1", info, table, new Date(2026, 0, 3, 9, 5, 7));

    expect(p).toBe(path.join(out, "our_players_camp1_20260103_090507.csv"));

    const bytes = fs.readFileSync(p);
    expect([...bytes.subarray(0, 3)]).toEqual([0xef, 0xbb, 0xbf]);

    const text = bytes.toString("utf8");
    expect(text.slice(1)).toBe(reportCsv(info, table));
    expect(text).toContain("张伟");
  });
});
