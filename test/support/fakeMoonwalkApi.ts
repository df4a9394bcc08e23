import { fastify, type FastifyInstance } from "fastify";
import type { FetchLike } from "../../src/infra/moonwalk/moonwalkClient.js";

export type FakeStep = { day: string; steps?: number | string | null };

export type FakeApiState = {
  players: unknown[];
  overview: { status: number; body: unknown };
  html: string | null;
  /** offset -> number of upcoming page requests at that offset that answer 500 */
  pageFailures: Map<number, number>;
  requests: { url: string; headers: Record<string, string | string[] | undefined> }[];
};

export function fakePlayer(name: string | null, steps: FakeStep[]): unknown {
  return { id: `p_${name ?? "anon"}`, user: name === null ? {} : { name }, steps };
}

export function overviewBody(val: Record<string, unknown>, sts = 200, isVld = true) {
  return { sts, isVld, msg: "", val };
}

/**
 * In-process stand-in for the campaign API. Serves players from
 * `state.players` with skip/take paging; nothing listens on a socket.
 */
export function buildFakeMoonwalkApi(initial: Partial<FakeApiState> = {}) {
  const state: FakeApiState = {
    players: [],
    overview: { status: 200, body: overviewBody({ code: "camp1", name: "Camp", steps: 10000 }) },
    html: null,
    pageFailures: new Map(),
    requests: [],
    ...initial
  };

  const app: FastifyInstance = fastify({ logger: false });

  app.addHook("onRequest", async (req) => {
    state.requests.push({ url: req.url, headers: req.headers });
  });

  app.get<{ Params: { code: string }; Querystring: { skip?: string; take?: string } }>(
    "/api/user-games/web/:code",
    async (req, reply) => {
      const skip = Number(req.query.skip ?? 0);
      const take = Number(req.query.take ?? 20);

      const failuresLeft = state.pageFailures.get(skip) ?? 0;
      if (failuresLeft > 0) {
        state.pageFailures.set(skip, failuresLeft - 1);
        return reply.status(500).send({ sts: 500, isVld: false, msg: "upstream error" });
      }

      return { sts: 200, isVld: true, val: state.players.slice(skip, skip + take) };
    }
  );

  app.get<{ Params: { code: string } }>("/api/games/overview/:code", async (_req, reply) => {
    return reply.status(state.overview.status).send(state.overview.body);
  });

  app.get<{ Params: { code: string } }>("/game/:code", async (_req, reply) => {
    if (state.html === null) return reply.status(404).send("not found");
    return reply.type("text/html").send(state.html);
  });

  return { app, state };
}

/** Routes client requests into `app.inject()` instead of the network. */
export function injectFetch(app: FastifyInstance): FetchLike {
  return async (url, init) => {
    const u = new URL(url);
    const res = await app.inject({
      method: "GET",
      url: u.pathname + u.search,
      headers: Object.fromEntries(new Headers(init.headers).entries())
    });
    return new Response(res.body, { status: res.statusCode, statusText: res.statusMessage });
  };
}
