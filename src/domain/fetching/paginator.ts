import type { CampaignCode } from "../campaigns/types.js";
import type { RawPlayerRecord } from "../players/types.js";
import {
  PAGE_SIZE,
  type FetchAllResult,
  type FetchProgressEvent,
  type PageSource
} from "./types.js";
import { DEFAULT_RETRY_POLICY, PAGE_PACING_MS, realSleep, type RetryPolicy, type Sleep } from "./retry.js";

export type FetchAllOptions = {
  pageSize?: number;
  retry?: RetryPolicy;
  pacingMs?: number;
  sleep?: Sleep;
  onProgress?: (e: FetchProgressEvent) => void;
};

/**
 * Walks the player endpoint page by page, in offset order, until a short
 * or empty page. A failing offset is retried up to `retry.maxRetries`
 * times; when that runs out, whatever was collected is returned with
 * `possiblyPartial: true`.
 */
export async function fetchAllPlayers(
  source: PageSource,
  campaignCode: CampaignCode,
  opts: FetchAllOptions = {}
): Promise<FetchAllResult> {
  const pageSize = opts.pageSize ?? PAGE_SIZE;
  const retry = opts.retry ?? DEFAULT_RETRY_POLICY;
  const pacingMs = opts.pacingMs ?? PAGE_PACING_MS;
  const sleep = opts.sleep ?? realSleep;
  const emit = opts.onProgress ?? (() => {});

  if (!Number.isInteger(pageSize) || pageSize <= 0) {
    throw new Error("Page size must be a positive integer.");
  }

  const players: RawPlayerRecord[] = [];
  let offset = 0;
  let retries = 0;

  for (;;) {
    const result = await source.fetchPage(campaignCode, { offset, pageSize });

    if (!result.ok) {
      if (retries < retry.maxRetries) {
        retries++;
        emit({ type: "PAGE_RETRY", offset, attempt: retries, error: result.error });
        await sleep(retry.delayMs(retries));
        continue;
      }
      emit({ type: "RETRIES_EXHAUSTED", offset, error: result.error, total: players.length });
      return { players, possiblyPartial: true };
    }

    retries = 0;
    const count = result.players.length;

    if (count === 0) {
      emit({ type: "PAGE_EMPTY", offset });
      break;
    }

    players.push(...result.players);
    emit({ type: "PAGE_FETCHED", offset, count, totalSoFar: players.length });

    if (count < pageSize) break;

    offset += pageSize;
    await sleep(pacingMs);
  }

  emit({ type: "END_OF_DATA", total: players.length });
  return { players, possiblyPartial: false };
}
