/**
 * Record lifecycle.
 *
 * Legal transitions depend on both the current status and the record's
 * kind: only buy and withdraw ever hold funds in `reserved`.
 *
 *   pending  → reserved     (buy, withdraw)
 *   pending  → confirmed    (deposit, withdraw, sell)
 *   pending  → failed       (all)
 *   reserved → confirmed    (buy, withdraw)
 *   reserved → rolled_back  (buy, withdraw)
 */

import type { TransactionKind, TransactionRecord, TransactionStatus } from "@linkvault/types";
import { InvalidTransitionError, isTerminalStatus } from "@linkvault/types";

type TransitionTable = {
  readonly [From in TransactionStatus]: {
    readonly [To in TransactionStatus]?: readonly TransactionKind[];
  };
};

const ALL_KINDS: readonly TransactionKind[] = ["deposit", "withdraw", "buy", "sell"];

export const VALID_TRANSITIONS: TransitionTable = {
  pending: {
    reserved: ["buy", "withdraw"],
    confirmed: ["deposit", "withdraw", "sell"],
    failed: ALL_KINDS,
  },
  reserved: {
    confirmed: ["buy", "withdraw"],
    rolled_back: ["buy", "withdraw"],
  },
  confirmed: {},
  failed: {},
  rolled_back: {},
};

export function canTransition(
  kind: TransactionKind,
  from: TransactionStatus,
  to: TransactionStatus,
): boolean {
  return VALID_TRANSITIONS[from][to]?.includes(kind) ?? false;
}

/**
 * @throws InvalidTransitionError if `record` may not move to `to`
 */
export function assertTransition(record: TransactionRecord, to: TransactionStatus): void {
  if (!canTransition(record.kind, record.status, to)) {
    throw new InvalidTransitionError(record.idempotencyKey, record.status, to);
  }
}

/** `confirmed`, `failed` and `rolled_back` are terminal. */
export const isTerminal = isTerminalStatus;
