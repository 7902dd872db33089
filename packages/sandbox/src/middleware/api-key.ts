/**
 * API key middleware.
 *
 * When the sandbox is started with a key, every API request must carry
 * it in X-Api-Key.
 */

import { timingSafeEqual } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";

function sameKey(given: string, expected: string): boolean {
  const a = Buffer.from(given, "utf-8");
  const b = Buffer.from(expected, "utf-8");
  return a.length === b.length && timingSafeEqual(a, b);
}

export function apiKeyMiddleware(expected: string): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const given = c.req.header(API_KEY_HEADER);
    if (given === undefined || !sameKey(given, expected)) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Missing or invalid API key"), 401);
    }
    return next();
  };
}
