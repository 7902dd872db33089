/**
 * Domain tool routes.
 *
 * GET /v1/lookup?url=       — Domain metrics
 * GET /v1/spam-score?url=   — Spam score
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { UrlQuerySchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";

export function createToolRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/lookup", (c) => {
    const query = UrlQuerySchema.safeParse(c.req.query());
    if (!query.success) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", "Query parameter 'url' is required"), 400);
    }
    return c.json({ data: c.get("market").lookup(query.data.url) });
  });

  routes.get("/spam-score", (c) => {
    const query = UrlQuerySchema.safeParse(c.req.query());
    if (!query.success) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", "Query parameter 'url' is required"), 400);
    }
    return c.json({ data: c.get("market").spamScore(query.data.url) });
  });

  return routes;
}
