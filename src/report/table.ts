import type { RosterReport } from "../domain/readModels/reportSelectors.js";
import stringWidth from "string-width";
import { formatCompletion, formatStepValue } from "./format.js";

export type ReportTable = {
  headers: string[];
  rows: string[][];
};

export function toReportTable(report: RosterReport): ReportTable {
  return {
    headers: ["ID", "Username", ...report.campaignDays, "Task Status"],
    rows: report.rows.map((r) => [
      String(r.id),
      r.username,
      ...r.series.map(formatStepValue),
      formatCompletion(r.status)
    ])
  };
}

function border(widths: number[], fill: string): string {
  return "+" + widths.map((w) => fill.repeat(w + 2)).join("+") + "+";
}

// Pads by terminal columns; CJK characters take two.
function padDisplay(s: string, width: number): string {
  return s + " ".repeat(Math.max(0, width - stringWidth(s)));
}

function line(cells: string[], widths: number[]): string {
  return "|" + cells.map((c, i) => ` ${padDisplay(c, widths[i])} `).join("|") + "|";
}

/**
 * Grid table:
 *
 *   +----+----------+
 *   | ID | Username |
 *   +====+==========+
 *   | 1  | alice    |
 *   +----+----------+
 */
export function renderGrid(table: ReportTable): string {
  const widths = table.headers.map((h, i) =>
    Math.max(stringWidth(h), ...table.rows.map((r) => stringWidth(r[i] ?? "")))
  );

  const out = [border(widths, "-"), line(table.headers, widths), border(widths, "=")];
  for (const row of table.rows) {
    out.push(line(table.headers.map((_, i) => row[i] ?? ""), widths), border(widths, "-"));
  }
  return out.join("\n");
}
