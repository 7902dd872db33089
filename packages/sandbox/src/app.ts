/**
 * Hono application factory.
 *
 * Separated from main.ts so tests drive the app through `app.request`
 * without starting an HTTP server.
 */

import { Hono } from "hono";
import pino from "pino";
import type { Logger } from "pino";
import type { AppEnv } from "./types/api-contract.js";
import { SandboxMarket } from "./services/market.js";
import type { SandboxMarketOptions } from "./services/market.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { requestLogger } from "./middleware/logger.js";
import { apiKeyMiddleware } from "./middleware/api-key.js";
import {
  idempotencyMiddleware,
  InMemoryIdempotencyStore,
} from "./middleware/idempotency.js";
import { createListingRoutes } from "./routes/listings.js";
import { createFundsRoutes } from "./routes/funds.js";
import { createToolRoutes } from "./routes/tools.js";
import { createErrorEnvelope } from "./types/error.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions extends SandboxMarketOptions {
  /** Access log. Default: silent */
  readonly logger?: Logger | undefined;
  readonly idempotencyTtlMs?: number | undefined;
  /** When set, /v1 requests must carry this X-Api-Key */
  readonly apiKey?: string | undefined;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly market: SandboxMarket;
  readonly idempotencyStore: InMemoryIdempotencyStore;
}

// =============================================================================
// Factory
// =============================================================================

export function createApp(options: CreateAppOptions = {}): AppInstance {
  const market = new SandboxMarket(options);
  const now = options.now ?? (() => new Date());
  const clock = (): number => now().getTime();
  const idempotencyStore = new InMemoryIdempotencyStore(
    options.idempotencyTtlMs ?? 86400000,
    clock,
  );

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());
  app.use("*", requestLogger(options.logger ?? pino({ level: "silent" })));

  app.onError(handleError);
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  app.get("/health", (c) => c.json({ status: "ok" }));

  // ─── API Routes ─────────────────────────────────────────────────
  if (options.apiKey !== undefined) {
    app.use("/v1/*", apiKeyMiddleware(options.apiKey));
  }
  app.use("/v1/*", async (c, next) => {
    c.set("market", market);
    await next();
  });
  app.use("/v1/*", idempotencyMiddleware(idempotencyStore, clock));

  app.route("/v1", createListingRoutes());
  app.route("/v1", createFundsRoutes());
  app.route("/v1", createToolRoutes());

  return { app, market, idempotencyStore };
}
