import type { RawPlayerRecord } from "../players/types.js";
import type { CampaignCode } from "../campaigns/types.js";

export const PAGE_SIZE = 20;

export type PageRequest = {
  offset: number;
  pageSize: number;
};

export type PageResult =
  | { ok: true; players: RawPlayerRecord[] }
  | { ok: false; error: string };

/** One offset/limit call against the player endpoint. Must not throw. */
export interface PageSource {
  fetchPage(campaignCode: CampaignCode, page: PageRequest): Promise<PageResult>;
}

export type FetchProgressEvent =
  | { type: "PAGE_FETCHED"; offset: number; count: number; totalSoFar: number }
  | { type: "PAGE_RETRY"; offset: number; attempt: number; error: string }
  | { type: "PAGE_EMPTY"; offset: number }
  | { type: "END_OF_DATA"; total: number }
  | { type: "RETRIES_EXHAUSTED"; offset: number; error: string; total: number };

export type FetchAllResult = {
  players: RawPlayerRecord[];
  possiblyPartial: boolean;
};
