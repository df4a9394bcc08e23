import type { CampaignCode, GameInfo } from "../../domain/campaigns/types.js";
import type { PageRequest, PageResult, PageSource } from "../../domain/fetching/types.js";
import { toISODate, unixToSlashDate } from "../../domain/shared/dates.js";
import {
  NuxtStateSchema,
  OverviewEnvelopeSchema,
  PageEnvelopeSchema,
  toRawPlayerRecord,
  type NuxtGamePayload,
  type OverviewPayload
} from "./schemas.js";
import { extractNuxtState } from "./nuxtState.js";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type MoonwalkClientOptions = {
  apiBaseUrl: string;
  webBaseUrl: string;
  requestTimeoutMs: number;
  fetch?: FetchLike;
};

export interface MoonwalkClient extends PageSource {
  fetchCampaignOverview(code: CampaignCode): Promise<GameInfo>;
  fetchCampaignFromWeb(code: CampaignCode): Promise<GameInfo>;
  campaignLink(code: CampaignCode): string;
}

const USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36";

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function describeIssues(issues: { path: (string | number)[]; message: string }[]): string {
  return issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
}

function gameInfoFromOverview(val: OverviewPayload, link: string): GameInfo {
  return {
    code: val.code,
    name: val.name,
    depositAmount: val.deposit,
    tokenSymbol: val.currency.toUpperCase(),
    startDate: unixToSlashDate(val.start),
    endDate: unixToSlashDate(val.end),
    stepTarget: val.steps,
    totalPlayers: val.size,
    link
  };
}

function gameInfoFromWeb(game: NuxtGamePayload, link: string): GameInfo {
  return {
    code: game.id,
    name: game.name,
    depositAmount: game.deposit,
    tokenSymbol: game.token,
    startDate: toISODate(game.startDate),
    endDate: toISODate(game.endDate),
    stepTarget: game.stepTarget,
    totalPlayers: game.totalPlayers,
    link
  };
}

export function createMoonwalkClient(opts: MoonwalkClientOptions): MoonwalkClient {
  const fetchImpl: FetchLike = opts.fetch ?? ((url, init) => fetch(url, init));

  function campaignLink(code: CampaignCode): string {
    return `${opts.webBaseUrl}/game/${encodeURIComponent(code)}`;
  }

  async function request(url: string, headers: Record<string, string>): Promise<string> {
    const res = await fetchImpl(url, {
      method: "GET",
      headers: { "User-Agent": USER_AGENT, ...headers },
      signal: AbortSignal.timeout(opts.requestTimeoutMs)
    });

    const text = await res.text();
    if (!res.ok) {
      throw new Error(`${res.status} ${res.statusText}: ${text.slice(0, 200)}`);
    }
    return text;
  }

  function apiHeaders(code: CampaignCode): Record<string, string> {
    return {
      Accept: "application/json",
      Origin: opts.webBaseUrl,
      Referer: campaignLink(code)
    };
  }

  async function requestJson(url: string, code: CampaignCode): Promise<unknown> {
    const text = await request(url, apiHeaders(code));
    try {
      return JSON.parse(text) as unknown;
    } catch {
      throw new Error(`Response from ${url} is not JSON.`);
    }
  }

  return {
    campaignLink,

    async fetchPage(code: CampaignCode, page: PageRequest): Promise<PageResult> {
      const url =
        `${opts.apiBaseUrl}/api/user-games/web/${encodeURIComponent(code)}` +
        `?skip=${page.offset}&take=${page.pageSize}`;
      try {
        const body = await requestJson(url, code);
        const envelope = PageEnvelopeSchema.safeParse(body);
        if (!envelope.success) {
          return { ok: false, error: `Unexpected page payload: ${describeIssues(envelope.error.issues)}` };
        }
        return { ok: true, players: envelope.data.val.map(toRawPlayerRecord) };
      } catch (err) {
        return { ok: false, error: errorMessage(err) };
      }
    },

    async fetchCampaignOverview(code: CampaignCode): Promise<GameInfo> {
      const url = `${opts.apiBaseUrl}/api/games/overview/${encodeURIComponent(code)}`;
      const body = await requestJson(url, code);

      const envelope = OverviewEnvelopeSchema.safeParse(body);
      if (!envelope.success) {
        throw new Error(`Unexpected overview payload: ${describeIssues(envelope.error.issues)}`);
      }
      if (envelope.data.sts !== 200 || !envelope.data.isVld) {
        throw new Error(`Overview rejected (sts=${envelope.data.sts}, isVld=${envelope.data.isVld}).`);
      }
      return gameInfoFromOverview(envelope.data.val, campaignLink(code));
    },

    async fetchCampaignFromWeb(code: CampaignCode): Promise<GameInfo> {
      const html = await request(campaignLink(code), {
        Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8"
      });

      const parsed = NuxtStateSchema.safeParse(extractNuxtState(html));
      if (!parsed.success) {
        throw new Error(`Unexpected campaign page state: ${describeIssues(parsed.error.issues)}`);
      }
      return gameInfoFromWeb(parsed.data.state.game.game, campaignLink(code));
    }
  };
}
