/**
 * Pure operations on a wallet's transaction list.
 *
 * They never mutate their input; each returns a new array so the
 * coordinator can fold a record change and a balance change into the
 * same store commit.
 */

import type {
  TransactionKind,
  TransactionPatch,
  TransactionRecord,
  TransactionStatus,
} from "@linkvault/types";
import { NotFoundError, ValidationError } from "@linkvault/types";
import { assertTransition, isTerminal } from "./transitions.js";

export interface PendingRecordInput {
  readonly idempotencyKey: string;
  readonly walletId: string;
  readonly kind: TransactionKind;
  /** Zero only for a buy whose price is not yet known */
  readonly amount: number;
  readonly counterpartyReference: string;
  readonly createdAt: string;
  readonly details?: Readonly<Record<string, string>> | undefined;
}

export function findRecord(
  transactions: readonly TransactionRecord[],
  idempotencyKey: string,
): TransactionRecord | undefined {
  return transactions.find((t) => t.idempotencyKey === idempotencyKey);
}

/**
 * Append a new `pending` record.
 *
 * @throws ValidationError on an empty or already used key, or a bad amount
 */
export function appendPending(
  transactions: readonly TransactionRecord[],
  input: PendingRecordInput,
): TransactionRecord[] {
  if (input.idempotencyKey.trim() === "") {
    throw new ValidationError("Idempotency key must not be empty", "idempotencyKey");
  }
  if (findRecord(transactions, input.idempotencyKey) !== undefined) {
    throw new ValidationError(
      `Idempotency key '${input.idempotencyKey}' is already recorded`,
      "idempotencyKey",
    );
  }
  if (!Number.isSafeInteger(input.amount) || input.amount < 0) {
    throw new ValidationError(`Invalid amount: ${String(input.amount)}`, "amount");
  }

  const record: TransactionRecord = {
    idempotencyKey: input.idempotencyKey,
    walletId: input.walletId,
    kind: input.kind,
    amount: input.amount,
    counterpartyReference: input.counterpartyReference,
    status: "pending",
    createdAt: input.createdAt,
    ...(input.details !== undefined ? { details: input.details } : {}),
  };
  return [...transactions, record];
}

function applyPatch(record: TransactionRecord, patch: TransactionPatch): TransactionRecord {
  return {
    ...record,
    ...(patch.amount !== undefined ? { amount: patch.amount } : {}),
    ...(patch.postedAtVersion !== undefined ? { postedAtVersion: patch.postedAtVersion } : {}),
    ...(patch.reversedAtVersion !== undefined ? { reversedAtVersion: patch.reversedAtVersion } : {}),
    ...(patch.remoteReference !== undefined ? { remoteReference: patch.remoteReference } : {}),
    ...(patch.checkoutUrl !== undefined ? { checkoutUrl: patch.checkoutUrl } : {}),
    ...(patch.reservationExpiresAt !== undefined
      ? { reservationExpiresAt: patch.reservationExpiresAt }
      : {}),
    ...(patch.failureReason !== undefined ? { failureReason: patch.failureReason } : {}),
    ...(patch.failure !== undefined ? { failure: patch.failure } : {}),
  };
}

/**
 * Attach fields to a record without changing its status.
 * Terminal records are immutable.
 */
export function patchRecord(
  transactions: readonly TransactionRecord[],
  idempotencyKey: string,
  patch: TransactionPatch,
): TransactionRecord[] {
  const existing = requireRecord(transactions, idempotencyKey);
  if (isTerminal(existing.status)) {
    throw new ValidationError(
      `Transaction '${idempotencyKey}' is ${existing.status} and can no longer change`,
      "idempotencyKey",
    );
  }
  return transactions.map((t) => (t === existing ? applyPatch(t, patch) : t));
}

/**
 * Move a record along a legal transition.
 * Reaching a terminal status stamps `completedAt`.
 *
 * @throws NotFoundError if no record has the key
 * @throws InvalidTransitionError if the transition is not allowed
 */
export function advanceRecord(
  transactions: readonly TransactionRecord[],
  idempotencyKey: string,
  to: TransactionStatus,
  completedAt: string,
  patch: TransactionPatch = {},
): TransactionRecord[] {
  const existing = requireRecord(transactions, idempotencyKey);
  assertTransition(existing, to);

  const advanced: TransactionRecord = {
    ...applyPatch(existing, patch),
    status: to,
    ...(isTerminal(to) ? { completedAt } : {}),
  };
  return transactions.map((t) => (t === existing ? advanced : t));
}

function requireRecord(
  transactions: readonly TransactionRecord[],
  idempotencyKey: string,
): TransactionRecord {
  const existing = findRecord(transactions, idempotencyKey);
  if (existing === undefined) {
    throw new NotFoundError(`No transaction recorded for idempotency key '${idempotencyKey}'`);
  }
  return existing;
}
