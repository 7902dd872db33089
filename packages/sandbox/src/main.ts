/**
 * linkvault-sandbox — Entry point.
 *
 * Starts the in-memory marketplace on @hono/node-server.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig } from "./config.js";
import { createApp } from "./app.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const { app } = createApp({
    reservationTtlMs: config.RESERVATION_TTL_MS,
    autoConfirmDeposits: config.AUTO_CONFIRM_DEPOSITS,
    idempotencyTtlMs: config.IDEMPOTENCY_TTL_MS,
    apiKey: config.SANDBOX_API_KEY,
    logger: logger.child({ component: "http" }),
  });

  const server = serve({ fetch: app.fetch, port: config.PORT, hostname: config.HOST });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      autoConfirmDeposits: config.AUTO_CONFIRM_DEPOSITS,
      apiKeyRequired: config.SANDBOX_API_KEY !== undefined,
    },
    "Sandbox marketplace started",
  );

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close(() => {
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
