/**
 * Services a command runs against, built once per invocation.
 */

import { randomUUID } from "node:crypto";
import { resolve } from "node:path";
import type { Logger } from "pino";
import { MarketplaceClient } from "@linkvault/client";
import type { MarketplaceGateway, SleepFn } from "@linkvault/client";
import { TransactionCoordinator } from "@linkvault/coordinator";
import { WalletStore } from "@linkvault/wallet-store";
import type { CliConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { generateToolId } from "./manifest.js";
import { promptHidden, resolvePassphrase } from "./passphrase.js";
import type { PromptFn } from "./passphrase.js";

export interface CliRuntime {
  readonly config: CliConfig;
  readonly logger: Logger;
  readonly store: WalletStore;
  readonly gateway: MarketplaceGateway;
  readonly coordinator: TransactionCoordinator;
  /** Resolve a user-supplied path against the working directory */
  resolvePath(path: string): string;
  /** Asks at most once per run; `confirm` asks twice when prompting */
  passphrase(confirm: boolean): Promise<string>;
  newIdempotencyKey(): string;
  newToolId(): string;
}

export interface RuntimeOverrides {
  readonly cwd?: string | undefined;
  readonly logger?: Logger | undefined;
  readonly fetchFn?: typeof fetch | undefined;
  readonly sleepFn?: SleepFn | undefined;
  readonly prompt?: PromptFn | undefined;
  readonly now?: (() => Date) | undefined;
  readonly newIdempotencyKey?: (() => string) | undefined;
  readonly newToolId?: (() => string) | undefined;
}

export function createRuntime(config: CliConfig, overrides: RuntimeOverrides = {}): CliRuntime {
  const logger = overrides.logger ?? createLogger(config);
  const cwd = overrides.cwd ?? process.cwd();
  const prompt = overrides.prompt ?? promptHidden;

  const store = new WalletStore({
    cost: { N: config.LINKVAULT_KDF_COST, r: 8, p: 1 },
    logger: logger.child({ component: "wallet-store" }),
    now: overrides.now,
  });
  const gateway = new MarketplaceClient({
    baseUrl: config.LINKVAULT_API_URL,
    apiKey: config.LINKVAULT_API_KEY,
    timeoutMs: config.LINKVAULT_HTTP_TIMEOUT_MS,
    retry: {
      maxAttempts: config.LINKVAULT_RETRY_ATTEMPTS,
      baseDelayMs: config.LINKVAULT_RETRY_BASE_MS,
    },
    fetchFn: overrides.fetchFn,
    sleepFn: overrides.sleepFn,
    logger: logger.child({ component: "client" }),
  });
  const coordinator = new TransactionCoordinator({
    store,
    gateway,
    logger: logger.child({ component: "coordinator" }),
    now: overrides.now,
    sleepFn: overrides.sleepFn,
  });

  let cached: string | undefined;

  return {
    config,
    logger,
    store,
    gateway,
    coordinator,
    resolvePath: (path) => resolve(cwd, path),
    async passphrase(confirm) {
      if (cached === undefined) {
        cached = await resolvePassphrase(config.LINKVAULT_PASSPHRASE, prompt, confirm);
      }
      return cached;
    },
    newIdempotencyKey: overrides.newIdempotencyKey ?? randomUUID,
    newToolId: overrides.newToolId ?? (() => generateToolId()),
  };
}
