export type RosterId = string | number;

export type RosterEntry = {
  username: string; // leading "@" already stripped
  id: RosterId;
  status: string;
};

/** Numeric IDs sort numerically; anything else falls back to string order. */
export function compareRosterIds(a: RosterId, b: RosterId): number {
  if (typeof a === "number" && typeof b === "number") return a - b;
  return String(a).localeCompare(String(b));
}
