/**
 * @linkvault/ledger — Idempotency Ledger.
 *
 * Durable per-wallet registry of TransactionRecords keyed by idempotency
 * key. Every write goes through WalletStore.record, so a record is on
 * disk before the caller makes any remote call.
 */

import type {
  TransactionKind,
  TransactionPatch,
  TransactionRecord,
  TransactionStatus,
} from "@linkvault/types";
import type { WalletStore } from "@linkvault/wallet-store";
import { advanceRecord, appendPending, findRecord, patchRecord } from "./records.js";

export interface IdempotencyLedgerOptions {
  readonly now?: (() => Date) | undefined;
}

export interface RecordFilter {
  readonly status?: TransactionStatus | readonly TransactionStatus[] | undefined;
  readonly kind?: TransactionKind | undefined;
}

function matches(record: TransactionRecord, filter: RecordFilter): boolean {
  if (filter.kind !== undefined && record.kind !== filter.kind) {
    return false;
  }
  if (filter.status !== undefined) {
    const statuses: readonly TransactionStatus[] =
      typeof filter.status === "string" ? [filter.status] : filter.status;
    return statuses.includes(record.status);
  }
  return true;
}

export class IdempotencyLedger {
  private readonly _store: WalletStore;
  private readonly _walletPath: string;
  private readonly _passphrase: string;
  private readonly _now: () => Date;

  constructor(
    store: WalletStore,
    walletPath: string,
    passphrase: string,
    options: IdempotencyLedgerOptions = {},
  ) {
    this._store = store;
    this._walletPath = walletPath;
    this._passphrase = passphrase;
    this._now = options.now ?? (() => new Date());
  }

  /**
   * Persist a new `pending` record.
   *
   * @throws ValidationError if the key is already recorded
   */
  recordPending(
    idempotencyKey: string,
    kind: TransactionKind,
    amount: number,
    counterpartyReference: string,
    details?: Readonly<Record<string, string>>,
  ): TransactionRecord {
    const createdAt = this._now().toISOString();
    const wallet = this._store.record(this._walletPath, this._passphrase, (transactions, w) =>
      appendPending(transactions, {
        idempotencyKey,
        walletId: w.walletId,
        kind,
        amount,
        counterpartyReference,
        createdAt,
        details,
      }),
    );
    return this._require(wallet.transactions, idempotencyKey);
  }

  /**
   * Perform an allowed transition.
   *
   * @throws InvalidTransitionError for any transition outside the table
   */
  advance(
    idempotencyKey: string,
    status: TransactionStatus,
    patch: TransactionPatch = {},
  ): TransactionRecord {
    const completedAt = this._now().toISOString();
    const wallet = this._store.record(this._walletPath, this._passphrase, (transactions) =>
      advanceRecord(transactions, idempotencyKey, status, completedAt, patch),
    );
    return this._require(wallet.transactions, idempotencyKey);
  }

  /** Attach fields to a non-terminal record without moving it. */
  annotate(idempotencyKey: string, patch: TransactionPatch): TransactionRecord {
    const wallet = this._store.record(this._walletPath, this._passphrase, (transactions) =>
      patchRecord(transactions, idempotencyKey, patch),
    );
    return this._require(wallet.transactions, idempotencyKey);
  }

  lookup(idempotencyKey: string): TransactionRecord | undefined {
    const wallet = this._store.load(this._walletPath, this._passphrase);
    return findRecord(wallet.transactions, idempotencyKey);
  }

  list(filter: RecordFilter = {}): readonly TransactionRecord[] {
    const wallet = this._store.load(this._walletPath, this._passphrase);
    return wallet.transactions.filter((record) => matches(record, filter));
  }

  private _require(
    transactions: readonly TransactionRecord[],
    idempotencyKey: string,
  ): TransactionRecord {
    const record = findRecord(transactions, idempotencyKey);
    if (record === undefined) {
      throw new Error(`Record '${idempotencyKey}' missing after write`);
    }
    return record;
  }
}
