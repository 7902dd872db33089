/**
 * Runtime Type Guards
 *
 * Narrowing functions for linkvault domain values at system boundaries
 * (decrypted bodies, CLI input, remote payloads).
 */

import type { TransactionKind, TransactionRecord, TransactionStatus } from "./transaction.js";

const KINDS = new Set<string>(["deposit", "withdraw", "buy", "sell"]);
const STATUSES = new Set<string>(["pending", "reserved", "confirmed", "failed", "rolled_back"]);
const TERMINAL = new Set<string>(["confirmed", "failed", "rolled_back"]);

export function isTransactionKind(value: unknown): value is TransactionKind {
  return typeof value === "string" && KINDS.has(value);
}

export function isTransactionStatus(value: unknown): value is TransactionStatus {
  return typeof value === "string" && STATUSES.has(value);
}

export function isTerminalStatus(status: TransactionStatus): boolean {
  return TERMINAL.has(status);
}

/**
 * A safe, non-negative integer amount in minor units.
 */
export function isMinorUnits(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

export function isTransactionRecord(value: unknown): value is TransactionRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.idempotencyKey === "string" &&
    v.idempotencyKey.length > 0 &&
    typeof v.walletId === "string" &&
    isTransactionKind(v.kind) &&
    isMinorUnits(v.amount) &&
    typeof v.counterpartyReference === "string" &&
    isTransactionStatus(v.status) &&
    typeof v.createdAt === "string"
  );
}
