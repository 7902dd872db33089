/**
 * @linkvault/coordinator — Request and result types.
 */

import type { Logger } from "pino";
import type {
  TransactionKind,
  TransactionRecord,
  TransactionStatus,
} from "@linkvault/types";
import type { WalletStore } from "@linkvault/wallet-store";
import type { MarketplaceGateway, RetryConfig, SleepFn } from "@linkvault/client";

export interface CoordinatorOptions {
  readonly store: WalletStore;
  readonly gateway: MarketplaceGateway;
  readonly logger?: Logger | undefined;
  readonly now?: (() => Date) | undefined;
  /** Backoff for restarting a local step after a ConflictError. Default 5 attempts. */
  readonly conflictRetry?: Partial<RetryConfig> | undefined;
  readonly sleepFn?: SleepFn | undefined;
}

/** Which wallet, and how to open it. */
export interface WalletContext {
  readonly walletPath: string;
  readonly passphrase: string;
}

export interface DepositRequest extends WalletContext {
  readonly idempotencyKey: string;
  readonly amount: number;
}

export interface WithdrawRequest extends WalletContext {
  readonly idempotencyKey: string;
  readonly amount: number;
  /** Payout destination reference */
  readonly destination: string;
}

export interface BuyRequest extends WalletContext {
  readonly idempotencyKey: string;
  readonly listingId: string;
}

export interface SellRequest extends WalletContext {
  readonly idempotencyKey: string;
  readonly sourceUrl: string;
  readonly targetUrl: string;
  readonly price: number;
  readonly anchor: string;
  readonly topic?: string | undefined;
}

/**
 * An operation described without its wallet or idempotency key.
 */
export type OperationRequest =
  | { readonly kind: "deposit"; readonly amount: number }
  | { readonly kind: "withdraw"; readonly amount: number; readonly destination: string }
  | { readonly kind: "buy"; readonly listingId: string }
  | {
      readonly kind: "sell";
      readonly sourceUrl: string;
      readonly targetUrl: string;
      readonly price: number;
      readonly anchor: string;
      readonly topic?: string | undefined;
    };

export interface OperationResult {
  readonly record: TransactionRecord;
  readonly balance: number;
  readonly version: number;
  /** True when a terminal record was returned without any remote call */
  readonly replayed: boolean;
}

export interface BalanceView {
  readonly walletId: string;
  readonly name: string;
  readonly balance: number;
  readonly version: number;
  readonly updatedAt: string;
  /** Records still pending or reserved */
  readonly openRecords: number;
}

export interface ReconcileEntry {
  readonly idempotencyKey: string;
  readonly kind: TransactionKind;
  readonly status: TransactionStatus;
  readonly reason?: string | undefined;
}

export interface ReconcileReport {
  readonly examined: number;
  readonly resolved: readonly ReconcileEntry[];
  readonly unresolved: readonly ReconcileEntry[];
}
