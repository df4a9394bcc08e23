import { pino, destination, type Logger } from "pino";
import type { LogLevel } from "./config.js";

export type { Logger };

// stderr only; stdout carries the report table. Sync so nothing is lost on process.exit.
export function createLogger(level: LogLevel): Logger {
  return pino({ level, base: undefined }, destination({ dest: 2, sync: true }));
}
