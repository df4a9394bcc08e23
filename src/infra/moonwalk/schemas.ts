import { z } from "zod";
import type { RawPlayerRecord } from "../../domain/players/types.js";

// ---- Player page: GET /api/user-games/web/:code?skip=&take= ----

export const PageEnvelopeSchema = z.object({
  val: z.array(z.unknown())
});

const StepEntrySchema = z.object({
  day: z.string(),
  steps: z.union([z.number(), z.string(), z.null()]).optional()
});

const PlayerSchema = z.object({
  user: z.object({ name: z.string().nullish() }).nullish(),
  steps: z.array(StepEntrySchema).nullish()
});

/**
 * Decodes one player object. A player that does not match the schema
 * comes back without a username so aggregation can skip it on its own.
 */
export function toRawPlayerRecord(input: unknown): RawPlayerRecord {
  const parsed = PlayerSchema.safeParse(input);
  if (!parsed.success) return { username: null, stepEntries: [] };

  const name = parsed.data.user?.name;
  return {
    username: name ? name : null,
    stepEntries: (parsed.data.steps ?? []).map((s) => ({ day: s.day, steps: s.steps }))
  };
}

// ---- Campaign overview: GET /api/games/overview/:code ----

export const OverviewEnvelopeSchema = z.object({
  sts: z.number(),
  isVld: z.boolean(),
  val: z
    .object({
      code: z.coerce.string().default("Unknown"),
      name: z.coerce.string().default("Unknown"),
      deposit: z.number().default(0),
      currency: z.string().default("Unknown"),
      start: z.number().default(0), // unix seconds
      end: z.number().default(0),
      steps: z.number().int().positive().default(10000),
      size: z.number().int().nonnegative().default(0)
    })
    .default({})
});

export type OverviewPayload = z.infer<typeof OverviewEnvelopeSchema>["val"];

// ---- Campaign web page: window.__NUXT__ state ----

export const NuxtStateSchema = z.object({
  state: z.object({
    game: z.object({
      game: z.object({
        id: z.coerce.string().default("Unknown"),
        name: z.coerce.string().default("Unknown"),
        deposit: z.number().default(0),
        token: z.string().default("Unknown"),
        startDate: z.string().default(""),
        endDate: z.string().default(""),
        stepTarget: z.number().int().positive().default(10000),
        totalPlayers: z.number().int().nonnegative().default(0)
      })
    })
  })
});

export type NuxtGamePayload = z.infer<typeof NuxtStateSchema>["state"]["game"]["game"];
