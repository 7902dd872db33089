/**
 * Sandbox configuration, loaded from environment variables with Zod.
 */

import { z } from "zod";

const BooleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8787),
  HOST: z.string().default("127.0.0.1"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

  RESERVATION_TTL_MS: z.coerce.number().int().min(1000).default(120000),
  AUTO_CONFIRM_DEPOSITS: BooleanFlag.default("true"),
  SANDBOX_API_KEY: z.string().min(1).optional(),
  IDEMPOTENCY_TTL_MS: z.coerce.number().int().min(1000).default(86400000),
});

export type SandboxConfig = z.infer<typeof ConfigSchema>;

/**
 * @throws {z.ZodError} if a variable is present but invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): SandboxConfig {
  return ConfigSchema.parse(env);
}
