/**
 * Transaction Types
 *
 * A TransactionRecord is the durable trace of one logical wallet operation,
 * keyed by the caller's idempotency key. Records form the wallet's audit
 * trail: they are appended, advanced along the protocol's legal
 * transitions, and never deleted.
 */

/**
 * The four operations that produce a record.
 */
export type TransactionKind = "deposit" | "withdraw" | "buy" | "sell";

/**
 * Protocol status of a record.
 *
 * `pending` and `reserved` are the only non-terminal states.
 */
export type TransactionStatus =
  | "pending"
  | "reserved"
  | "confirmed"
  | "failed"
  | "rolled_back";

export interface TransactionRecord {
  /** Client-supplied, unique per logical operation */
  readonly idempotencyKey: string;

  readonly walletId: string;

  readonly kind: TransactionKind;

  /**
   * Amount in minor currency units (cents). Positive, except for a buy
   * that has not been reserved yet: it records 0 until the price is known.
   */
  readonly amount: number;

  /** Listing id (buy), payout destination (withdraw), source URL (sell), wallet id (deposit) */
  readonly counterpartyReference: string;

  readonly status: TransactionStatus;

  readonly createdAt: string;

  /** Set once the record reaches a terminal status */
  readonly completedAt?: string | undefined;

  /**
   * Wallet version written by the apply that moved this record's funds.
   * Its presence is the proof that the local balance effect already happened.
   */
  readonly postedAtVersion?: number | undefined;

  /** Wallet version written by the compensating credit of a reversed debit */
  readonly reversedAtVersion?: number | undefined;

  /** Marketplace handle: reservation, deposit, payout or created listing id */
  readonly remoteReference?: string | undefined;

  /** Payment processor checkout URL while a deposit awaits the user */
  readonly checkoutUrl?: string | undefined;

  /** Reservation deadline reported by the marketplace (buy) */
  readonly reservationExpiresAt?: string | undefined;

  /** Last failure recorded against this record */
  readonly failureReason?: string | undefined;

  /** Error class that settled the record as failed or rolled_back */
  readonly failure?: RecordedFailure | undefined;

  /** Kind-specific inputs, compared when an idempotency key is reused */
  readonly details?: Readonly<Record<string, string>> | undefined;
}

/**
 * The part of a terminal failure a replay needs to raise the same error.
 */
export type RecordedFailure =
  | {
      readonly code: "INSUFFICIENT_FUNDS";
      readonly balance: number;
      readonly required: number;
    }
  | {
      readonly code: "REMOTE_REJECTED";
      readonly remoteCode: string;
      readonly status: number;
    };

/**
 * Fields the coordinator may attach while advancing a record.
 */
export type TransactionPatch = Partial<
  Pick<
    TransactionRecord,
    | "amount"
    | "postedAtVersion"
    | "reversedAtVersion"
    | "remoteReference"
    | "checkoutUrl"
    | "reservationExpiresAt"
    | "failureReason"
    | "failure"
  >
>;
