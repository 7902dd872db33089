/**
 * @linkvault/cli — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * Invalid settings surface as a ValidationError so the CLI exits with the
 * usage code.
 */

import { z } from "zod";
import { ValidationError } from "@linkvault/types";

// =============================================================================
// Schema
// =============================================================================

const BooleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

function isPowerOfTwo(n: number): boolean {
  return n > 0 && (n & (n - 1)) === 0;
}

export const ConfigSchema = z.object({
  LINKVAULT_API_URL: z.string().url().default("http://127.0.0.1:8787"),
  LINKVAULT_API_KEY: z.string().min(1).optional(),
  LINKVAULT_PASSPHRASE: z.string().min(1).optional(),
  LINKVAULT_HTTP_TIMEOUT_MS: z.coerce.number().int().min(100).default(15000),
  LINKVAULT_RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  LINKVAULT_RETRY_BASE_MS: z.coerce.number().int().min(0).default(500),
  LINKVAULT_KDF_COST: z.coerce
    .number()
    .int()
    .min(1024)
    .max(1048576)
    .refine(isPowerOfTwo, "must be a power of two")
    .default(32768),
  LINKVAULT_AUTO_RECONCILE: BooleanFlag.default("true"),

  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("warn"),
  NODE_ENV: z.enum(["development", "production", "test"]).default("production"),
});

export type CliConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * @throws ValidationError naming every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): CliConfig {
  const result = ConfigSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ValidationError(`Invalid configuration: ${problems.join("; ")}`, "env");
  }
  return result.data;
}
