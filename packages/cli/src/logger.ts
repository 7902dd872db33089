/**
 * Root logger for the CLI.
 *
 * Logs go to stderr so stdout stays machine-readable.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { CliConfig } from "./config.js";

export function createLogger(config: Pick<CliConfig, "LOG_LEVEL" | "NODE_ENV">): Logger {
  if (config.NODE_ENV === "development") {
    return pino({
      level: config.LOG_LEVEL,
      transport: { target: "pino-pretty", options: { destination: 2 } },
    });
  }
  return pino({ level: config.LOG_LEVEL }, pino.destination(2));
}
