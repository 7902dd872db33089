/**
 * Idempotency-Key handling for POST routes.
 *
 * A key is scoped to the route it was sent to. Repeating a request with
 * the same key and body within the TTL replays the stored response; the
 * same key with a different body is refused with 422. Responses with
 * status >= 400 are not stored, so a refused request may be retried
 * under its key.
 */

import { createHash } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { MarketError } from "../types/error.js";

export const IDEMPOTENCY_HEADER = "Idempotency-Key";
export const REPLAY_HEADER = "X-Idempotent-Replay";

// ─── Store ──────────────────────────────────────────────────────────

export interface StoredResponse {
  /** sha256 of the request body */
  readonly fingerprint: string;
  readonly status: number;
  readonly body: string;
  readonly contentType: string | undefined;
  readonly storedAt: number;
}

export class InMemoryIdempotencyStore {
  private readonly _entries = new Map<string, StoredResponse>();
  private readonly _ttlMs: number;
  private readonly _now: () => number;

  constructor(ttlMs = 86_400_000, now: () => number = Date.now) {
    this._ttlMs = ttlMs;
    this._now = now;
  }

  /** Live entry for `scope`; expired entries are dropped on the way. */
  lookup(scope: string): StoredResponse | undefined {
    const entry = this._entries.get(scope);
    if (entry !== undefined && this._now() - entry.storedAt > this._ttlMs) {
      this._entries.delete(scope);
      return undefined;
    }
    return entry;
  }

  /** Store a response and drop every entry that has expired. */
  remember(scope: string, response: StoredResponse): void {
    const now = this._now();
    // Insertion order is storage order, so the expired entries lead
    for (const [stored, entry] of this._entries) {
      if (now - entry.storedAt <= this._ttlMs) break;
      this._entries.delete(stored);
    }
    this._entries.set(scope, response);
  }

  get size(): number {
    return this._entries.size;
  }

  clear(): void {
    this._entries.clear();
  }
}

// ─── Middleware ─────────────────────────────────────────────────────

export function idempotencyMiddleware(
  store: InMemoryIdempotencyStore,
  now: () => number = Date.now,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const key = c.req.header(IDEMPOTENCY_HEADER);
    if (c.req.method !== "POST" || key === undefined) {
      return next();
    }

    const scope = `${c.req.path}\n${key}`;
    const fingerprint = createHash("sha256").update(await c.req.text()).digest("hex");

    const stored = store.lookup(scope);
    if (stored !== undefined) {
      if (stored.fingerprint !== fingerprint) {
        throw new MarketError(
          "IDEMPOTENCY_KEY_REUSED",
          `Idempotency-Key ${key} was already used for a different request`,
          422,
        );
      }
      const headers = new Headers({ [REPLAY_HEADER]: "true" });
      if (stored.contentType !== undefined) {
        headers.set("Content-Type", stored.contentType);
      }
      return new Response(stored.body, { status: stored.status, headers });
    }

    await next();

    if (c.res.status < 400) {
      store.remember(scope, {
        fingerprint,
        status: c.res.status,
        body: await c.res.clone().text(),
        contentType: c.res.headers.get("Content-Type") ?? undefined,
        storedAt: now(),
      });
    }
  };
}
