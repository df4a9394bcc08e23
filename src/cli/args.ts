export const USAGE = "Usage: step-tracker <campaign_code>";

export type ParsedArgs = { ok: true; campaignCode: string } | { ok: false; reason: string };

/** Exactly one positional argument: the campaign code. */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  if (argv.length !== 1) {
    return { ok: false, reason: `expected 1 argument, got ${argv.length}` };
  }
  const campaignCode = argv[0].trim();
  if (!campaignCode) return { ok: false, reason: "campaign code is empty" };
  return { ok: true, campaignCode };
}
