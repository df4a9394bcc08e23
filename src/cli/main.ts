#!/usr/bin/env node
import "dotenv/config";
import { parseArgs, USAGE } from "./args.js";
import { runTracker } from "./runTracker.js";
import { loadConfig } from "../infra/config.js";
import { createLogger } from "../infra/logger.js";
import { createMoonwalkClient } from "../infra/moonwalk/moonwalkClient.js";

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));
  if (!args.ok) {
    process.stderr.write(`${USAGE}\n`);
    return 1;
  }

  const config = loadConfig();
  const logger = createLogger(config.logLevel);

  try {
    await runTracker(args.campaignCode, {
      client: createMoonwalkClient(config),
      logger,
      rosterPath: config.rosterPath,
      outputDir: config.outputDir
    });
    return 0;
  } catch (err) {
    logger.error({ err }, err instanceof Error ? err.message : String(err));
    return 1;
  }
}

main()
  .then((code) => process.exit(code))
  .catch((e) => {
    console.error("step-tracker error:", e);
    process.exit(1);
  });
