import path from "node:path";
import { z } from "zod";

// Env values may carry stray whitespace or be present but blank; both mean "use the default".
function blankToUndefined(v: unknown): unknown {
  if (typeof v !== "string") return v;
  const t = v.trim();
  return t ? t : undefined;
}

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const EnvSchema = z.object({
  TRACKER_API_BASE_URL: z.preprocess(blankToUndefined, z.string().url().default("https://api.moonwalk.fit")),
  TRACKER_WEB_BASE_URL: z.preprocess(blankToUndefined, z.string().url().default("https://app.moonwalk.fit")),
  TRACKER_ROSTER_FILE: z.preprocess(blankToUndefined, z.string().default("moonwalk_users.csv")),
  TRACKER_OUTPUT_DIR: z.preprocess(blankToUndefined, z.string().default(".")),
  TRACKER_REQUEST_TIMEOUT_MS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(15000)),
  LOG_LEVEL: z.preprocess(blankToUndefined, z.enum(LOG_LEVELS).default("info"))
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export type TrackerConfig = {
  apiBaseUrl: string;
  webBaseUrl: string;
  rosterPath: string;
  outputDir: string;
  requestTimeoutMs: number;
  logLevel: LogLevel;
};

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd()
): TrackerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${detail}`);
  }

  const e = parsed.data;
  return {
    apiBaseUrl: stripTrailingSlash(e.TRACKER_API_BASE_URL),
    webBaseUrl: stripTrailingSlash(e.TRACKER_WEB_BASE_URL),
    rosterPath: path.resolve(cwd, e.TRACKER_ROSTER_FILE),
    outputDir: path.resolve(cwd, e.TRACKER_OUTPUT_DIR),
    requestTimeoutMs: e.TRACKER_REQUEST_TIMEOUT_MS,
    logLevel: e.LOG_LEVEL
  };
}
