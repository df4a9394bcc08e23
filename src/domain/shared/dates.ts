export type ISODate = string; // "2026-01-02"

/** "2026-01-02T00:00:00.000Z" -> "2026-01-02" */
export function toISODate(day: string): ISODate {
  return day.includes("T") ? day.split("T")[0] : day;
}

export function isOnOrBefore(a: ISODate, b: ISODate): boolean {
  return new Date(a + "T00:00:00Z").getTime() <= new Date(b + "T00:00:00Z").getTime();
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** Local calendar date of `d`. */
export function localISODate(d: Date = new Date()): ISODate {
  return `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())}`;
}

/** Unix seconds -> "2026/01/02" in local time. */
export function unixToSlashDate(seconds: number): string {
  const d = new Date(seconds * 1000);
  return `${d.getFullYear()}/${pad2(d.getMonth() + 1)}/${pad2(d.getDate())}`;
}

/** "20260102_153045" in local time, used for export file names. */
export function fileStamp(d: Date = new Date()): string {
  return (
    `${d.getFullYear()}${pad2(d.getMonth() + 1)}${pad2(d.getDate())}_` +
    `${pad2(d.getHours())}${pad2(d.getMinutes())}${pad2(d.getSeconds())}`
  );
}
