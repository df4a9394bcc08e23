import fs from "node:fs";
import * as XLSX from "xlsx";
import type { RosterEntry, RosterId } from "../domain/roster/types.js";

const ROSTER_COLUMNS = {
  name: "Name",
  id: "ID",
  status: "账号状态"
} as const;

function toRosterId(v: unknown): RosterId | null {
  if (typeof v === "number" && Number.isFinite(v)) return v;
  if (typeof v !== "string") return null;
  const t = v.trim();
  if (!t) return null;
  return /^(0|[1-9]\d*)$/.test(t) ? Number(t) : t;
}

/**
 * Reads the roster CSV (Name, ID, 账号状态).
 * Throws when the file is missing, unreadable or has no usable rows.
 */
export function readRoster(filePath: string): RosterEntry[] {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Roster file not found: ${filePath}`);
  }

  const text = fs.readFileSync(filePath, "utf8").replace(/^\uFEFF/, "");
  if (!text.trim()) throw new Error(`Roster file is empty: ${filePath}`);

  // raw: keep cells as text; toRosterId decides which IDs become numbers ("007" stays text)
  const wb = XLSX.read(text, { type: "string", raw: true });
  const sheet = wb.Sheets[wb.SheetNames[0]];
  if (!sheet) throw new Error(`Roster file has no rows: ${filePath}`);

  const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, { defval: null });
  const byName = new Map<string, RosterEntry>();

  for (const row of rows) {
    const name = row[ROSTER_COLUMNS.name];
    if (typeof name !== "string") continue;

    const username = name.trim().replace(/^@/, "");
    if (!username) continue;

    const status = row[ROSTER_COLUMNS.status];
    byName.set(username, {
      username,
      id: toRosterId(row[ROSTER_COLUMNS.id]) ?? "",
      status: typeof status === "string" ? status : ""
    });
  }

  if (byName.size === 0) {
    throw new Error(`Roster file has no usable "${ROSTER_COLUMNS.name}" entries: ${filePath}`);
  }
  return [...byName.values()];
}
