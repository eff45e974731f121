import express from "express";
import { z } from "zod";
import { Logger, MatchResult, ProductMatcher } from "@chanwatch/core";
import { DEFAULT_LIST_LIMIT, MatchStore, StoredMatch } from "@chanwatch/worker";

const MAX_LIST_LIMIT = 500;

const MatchBody = z.object({
  text: z.string(),
});

const ListQuery = z.object({
  limit: z.coerce.number().int().min(1).max(MAX_LIST_LIMIT).default(DEFAULT_LIST_LIMIT),
  product: z.string().min(1).optional(),
});

export type RouteResult<T> = { status: 200; body: T } | { status: 400 | 503; body: { error: string } };

function describe(error: z.ZodError): string {
  return error.errors.map((e) => `${e.path.join(".") || "body"}: ${e.message}`).join("; ");
}

export function handleMatchRequest(body: unknown, matcher: ProductMatcher): RouteResult<{ matches: MatchResult[] }> {
  const parsed = MatchBody.safeParse(body);
  if (!parsed.success) {
    return { status: 400, body: { error: describe(parsed.error) } };
  }
  return { status: 200, body: { matches: matcher.matchMessage(parsed.data.text) } };
}

export function handleListMatches(
  query: unknown,
  store: MatchStore | null
): RouteResult<{ total: number; matches: StoredMatch[] }> {
  if (!store) {
    return { status: 503, body: { error: "Match storage is disabled" } };
  }
  const parsed = ListQuery.safeParse(query);
  if (!parsed.success) {
    return { status: 400, body: { error: describe(parsed.error) } };
  }
  const filter = parsed.data.product ? { productName: parsed.data.product } : {};
  return {
    status: 200,
    body: { total: store.countMatches(filter), matches: store.listMatches(parsed.data.limit, filter) },
  };
}

export function createApp(deps: { matcher: ProductMatcher; store: MatchStore | null; logger: Logger }) {
  const { matcher, store, logger } = deps;
  const app = express();
  app.use(express.json({ limit: "256kb" }));

  app.get("/health", (req, res) => {
    res.json({ ok: true });
  });

  app.post("/match", (req, res) => {
    const result = handleMatchRequest(req.body, matcher);
    if (result.status !== 200) {
      logger.debug({ error: result.body.error }, "Rejected match request");
    }
    res.status(result.status).json(result.body);
  });

  app.get("/matches", (req, res) => {
    const result = handleListMatches(req.query, store);
    res.status(result.status).json(result.body);
  });

  return app;
}
