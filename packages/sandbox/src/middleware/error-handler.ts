/**
 * Global error handler.
 *
 * Renders MarketError with its own status and code, Hono HTTP
 * exceptions (such as a malformed JSON body) as validation errors, and
 * everything else as an opaque 500.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import { createErrorEnvelope, MarketError } from "../types/error.js";

export function handleError(err: Error, c: Context): Response {
  if (err instanceof MarketError) {
    return c.json(createErrorEnvelope(err.code, err.message), err.status);
  }
  if (err instanceof HTTPException && err.status === 400) {
    return c.json(createErrorEnvelope("VALIDATION_ERROR", err.message), 400);
  }
  return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
}
