/**
 * Error taxonomy shared by every linkvault package.
 *
 * Each failure class carries a stable `code` so callers (the CLI's exit
 * codes, the coordinator's retry predicates) branch on the class rather
 * than on message text.
 */

import type { RecordedFailure, TransactionStatus } from "./transaction.js";

export type LinkVaultErrorCode =
  | "VALIDATION_ERROR"
  | "DECRYPTION_FAILED"
  | "SCHEMA_INVALID"
  | "INSUFFICIENT_FUNDS"
  | "CONFLICT"
  | "NETWORK_ERROR"
  | "REMOTE_REJECTED"
  | "INVALID_TRANSITION"
  | "ALREADY_EXISTS"
  | "NOT_FOUND";

/**
 * Base class. Always thrown, never returned.
 */
export abstract class LinkVaultError extends Error {
  public abstract readonly code: LinkVaultErrorCode;
}

/** Malformed local input. Never retried. */
export class ValidationError extends LinkVaultError {
  public readonly code = "VALIDATION_ERROR" as const;
  public readonly field: string | undefined;

  constructor(message: string, field?: string) {
    super(message);
    this.name = "ValidationError";
    this.field = field;
  }
}

/** Wrong passphrase or corrupted ciphertext. */
export class DecryptionError extends LinkVaultError {
  public readonly code = "DECRYPTION_FAILED" as const;

  constructor(message = "Unable to decrypt wallet: wrong passphrase or corrupted file") {
    super(message);
    this.name = "DecryptionError";
  }
}

/** Structure is unreadable (outer document or decrypted body). */
export class SchemaError extends LinkVaultError {
  public readonly code = "SCHEMA_INVALID" as const;
  public readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(message);
    this.name = "SchemaError";
    this.issues = issues;
  }
}

export class InsufficientFundsError extends LinkVaultError {
  public readonly code = "INSUFFICIENT_FUNDS" as const;
  public readonly balance: number;
  public readonly required: number;

  constructor(balance: number, required: number) {
    super(`Insufficient funds: balance ${balance}, required ${required}`);
    this.name = "InsufficientFundsError";
    this.balance = balance;
    this.required = required;
  }
}

/** A concurrent writer got there first, or holds the wallet lock. */
export class ConflictError extends LinkVaultError {
  public readonly code = "CONFLICT" as const;

  constructor(message: string) {
    super(message);
    this.name = "ConflictError";
  }
}

/** Transient transport failure that outlived its retry budget. */
export class NetworkError extends LinkVaultError {
  public readonly code = "NETWORK_ERROR" as const;
  public readonly attempts: number;

  constructor(message: string, attempts = 1) {
    super(message);
    this.name = "NetworkError";
    this.attempts = attempts;
  }
}

/** Definitive refusal by the marketplace (4xx or an invalid response). */
export class RemoteRejectionError extends LinkVaultError {
  public readonly code = "REMOTE_REJECTED" as const;
  /** HTTP status, 0 when the response itself was unusable */
  public readonly status: number;
  public readonly remoteCode: string;

  constructor(remoteCode: string, message: string, status: number) {
    super(message);
    this.name = "RemoteRejectionError";
    this.remoteCode = remoteCode;
    this.status = status;
  }
}

/** Illegal record transition. Indicates ledger corruption or a bug. */
export class InvalidTransitionError extends LinkVaultError {
  public readonly code = "INVALID_TRANSITION" as const;
  public readonly from: TransactionStatus;
  public readonly to: TransactionStatus;

  constructor(idempotencyKey: string, from: TransactionStatus, to: TransactionStatus) {
    super(`Transaction '${idempotencyKey}' cannot move from '${from}' to '${to}'`);
    this.name = "InvalidTransitionError";
    this.from = from;
    this.to = to;
  }
}

export class AlreadyExistsError extends LinkVaultError {
  public readonly code = "ALREADY_EXISTS" as const;

  constructor(message: string) {
    super(message);
    this.name = "AlreadyExistsError";
  }
}

export class NotFoundError extends LinkVaultError {
  public readonly code = "NOT_FOUND" as const;

  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

export function isLinkVaultError(err: unknown): err is LinkVaultError {
  return err instanceof LinkVaultError;
}

// ─── Recorded failures ───────────────────────────────────────────────────

/** Errors that can settle a transaction record for good. */
export type SettlingError = InsufficientFundsError | RemoteRejectionError;

export function recordedFailure(err: SettlingError): RecordedFailure {
  if (err instanceof InsufficientFundsError) {
    return { code: err.code, balance: err.balance, required: err.required };
  }
  return { code: err.code, remoteCode: err.remoteCode, status: err.status };
}

/**
 * Rebuild the error a record was settled with.
 * `message` is used for remote refusals, whose text is not derivable.
 */
export function errorFromFailure(failure: RecordedFailure, message: string): SettlingError {
  switch (failure.code) {
    case "INSUFFICIENT_FUNDS":
      return new InsufficientFundsError(failure.balance, failure.required);
    case "REMOTE_REJECTED":
      return new RemoteRejectionError(failure.remoteCode, message, failure.status);
  }
}
