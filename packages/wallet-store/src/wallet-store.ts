/**
 * @linkvault/wallet-store — Encrypted single-file wallet persistence.
 *
 * File format: one JSON document whose plaintext header is bound to the
 * sealed ledger body as associated data.
 * {"format":1,"walletId":"...","name":"...","version":3,"keyDerivation":{...},
 *  "cipher":"aes-256-gcm","encryptedBlob":"...","updatedAt":"..."}
 *
 * Write path (apply / record):
 * 1. Take the exclusive lock file
 * 2. Load and decrypt; remember the version and blob
 * 3. Run the synchronous mutation (no I/O under the lock)
 * 4. Validate the candidate body
 * 5. Re-read the on-disk document; any change means a competing writer
 * 6. Seal and replace atomically; release the lock on every exit path
 */

import { existsSync, readFileSync } from "node:fs";
import { randomUUID } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import pino from "pino";
import type { Logger } from "pino";
import type {
  LedgerBody,
  ScryptCost,
  TransactionRecord,
  Wallet,
  WalletDocument,
  WalletHeader,
} from "@linkvault/types";
import {
  AlreadyExistsError,
  ConflictError,
  InsufficientFundsError,
  NotFoundError,
  SchemaError,
} from "@linkvault/types";
import {
  DEFAULT_SCRYPT_COST,
  createKeyDerivationParams,
  deriveKey,
  openWithKey,
  sealWithKey,
} from "@linkvault/envelope";
import { parseLedgerBody, parseWalletDocument } from "./schema.js";
import { acquireFileLock, errnoCode } from "./file-lock.js";
import { writeFileAtomic } from "./atomic-write.js";

// =============================================================================
// Types
// =============================================================================

export interface WalletStoreOptions {
  /** scrypt cost for newly created wallets */
  readonly cost?: ScryptCost | undefined;
  /** Age after which a lock file is considered abandoned. Default 30 s. */
  readonly staleLockMs?: number | undefined;
  readonly logger?: Logger | undefined;
  readonly now?: (() => Date) | undefined;
}

export interface CreateOptions {
  readonly overwrite?: boolean | undefined;
}

export interface ApplyOptions {
  /** Fail with ConflictError unless the stored version matches */
  readonly expectedVersion?: number | undefined;
}

/**
 * Balance mutation. Must be pure and synchronous; it runs under the lock.
 */
export type BodyMutation = (body: LedgerBody, wallet: Wallet) => LedgerBody;

/**
 * Transactions-only mutation used for record bookkeeping.
 */
export type RecordsMutation = (
  transactions: readonly TransactionRecord[],
  wallet: Wallet,
) => readonly TransactionRecord[];

export const DEFAULT_STALE_LOCK_MS = 30_000;

// =============================================================================
// Serialization
// =============================================================================

function headerOf(doc: WalletHeader): WalletHeader {
  return {
    format: doc.format,
    walletId: doc.walletId,
    name: doc.name,
    version: doc.version,
    keyDerivation: doc.keyDerivation,
    cipher: doc.cipher,
  };
}

/**
 * RFC 8785 canonical form of the header, used as AEAD associated data.
 */
export function headerAssociatedData(header: WalletHeader): string {
  return canonicalize(headerOf(header));
}

/** Canonical body JSON. Absent optional fields are dropped first. */
function serializeBody(body: LedgerBody): string {
  const plain: unknown = JSON.parse(JSON.stringify(body));
  return canonicalize(plain);
}

function toWallet(doc: WalletDocument, body: LedgerBody): Wallet {
  return {
    walletId: doc.walletId,
    name: doc.name,
    version: doc.version,
    balance: body.balance,
    transactions: body.transactions,
    keyDerivation: doc.keyDerivation,
    updatedAt: doc.updatedAt,
  };
}

function readDocument(path: string): WalletDocument {
  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (err: unknown) {
    if (errnoCode(err) === "ENOENT") {
      throw new NotFoundError(`Wallet file not found: ${path}`);
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err: unknown) {
    throw new SchemaError("Wallet file is not valid JSON", [
      err instanceof Error ? err.message : String(err),
    ]);
  }
  return parseWalletDocument(parsed);
}

function decryptBody(doc: WalletDocument, key: Buffer): LedgerBody {
  const plaintext = openWithKey(doc.encryptedBlob, key, headerAssociatedData(doc));
  let parsed: unknown;
  try {
    parsed = JSON.parse(plaintext);
  } catch {
    throw new SchemaError("Decrypted ledger body is not valid JSON");
  }
  return parseLedgerBody(parsed);
}

function validateCandidate(previous: LedgerBody, candidate: LedgerBody): LedgerBody {
  if (typeof candidate.balance === "number" && candidate.balance < 0) {
    throw new InsufficientFundsError(previous.balance, previous.balance - candidate.balance);
  }
  return parseLedgerBody(candidate);
}

// =============================================================================
// Store
// =============================================================================

/**
 * Owns wallet files. Every balance change goes through `apply`.
 */
export class WalletStore {
  private readonly _cost: ScryptCost;
  private readonly _staleLockMs: number;
  private readonly _logger: Logger;
  private readonly _now: () => Date;

  constructor(options: WalletStoreOptions = {}) {
    this._cost = options.cost ?? DEFAULT_SCRYPT_COST;
    this._staleLockMs = options.staleLockMs ?? DEFAULT_STALE_LOCK_MS;
    this._logger = options.logger ?? pino({ level: "silent" });
    this._now = options.now ?? (() => new Date());
  }

  exists(path: string): boolean {
    return existsSync(path);
  }

  /**
   * Create a new empty wallet at `path`.
   *
   * @throws AlreadyExistsError if the file exists and `overwrite` is not set
   */
  create(path: string, name: string, passphrase: string, options: CreateOptions = {}): Wallet {
    const params = createKeyDerivationParams(this._cost);
    const key = deriveKey(passphrase, params);

    const lock = this._lock(path);
    try {
      if (existsSync(path) && options.overwrite !== true) {
        throw new AlreadyExistsError(`Wallet file already exists: ${path}`);
      }

      const header: WalletHeader = {
        format: 1,
        walletId: randomUUID(),
        name,
        version: 1,
        keyDerivation: params,
        cipher: "aes-256-gcm",
      };
      const body: LedgerBody = { balance: 0, transactions: [] };
      const doc = this._write(path, header, body, key);
      this._logger.info({ walletId: doc.walletId, path }, "wallet created");
      return toWallet(doc, body);
    } finally {
      lock.release();
    }
  }

  /**
   * Open and decrypt a wallet.
   *
   * @throws NotFoundError, SchemaError, DecryptionError
   */
  load(path: string, passphrase: string): Wallet {
    const doc = readDocument(path);
    const key = deriveKey(passphrase, doc.keyDerivation);
    return toWallet(doc, decryptBody(doc, key));
  }

  /**
   * Apply a balance mutation and persist it as `version + 1`.
   *
   * @throws ConflictError if the lock is held, the version moved, or
   *   `expectedVersion` does not match
   * @throws InsufficientFundsError if the candidate balance is negative
   * @throws SchemaError if the candidate body is otherwise invalid
   */
  apply(
    path: string,
    passphrase: string,
    mutation: BodyMutation,
    options: ApplyOptions = {},
  ): Wallet {
    return this._commit(path, passphrase, true, options.expectedVersion, (body, wallet) =>
      validateCandidate(body, mutation(body, wallet)),
    );
  }

  /**
   * Rewrite the transaction list only. Balance and version are unchanged.
   */
  record(path: string, passphrase: string, mutation: RecordsMutation): Wallet {
    return this._commit(path, passphrase, false, undefined, (body, wallet) =>
      parseLedgerBody({ balance: body.balance, transactions: mutation(body.transactions, wallet) }),
    );
  }

  // ─── Internal ──────────────────────────────────────────────────────

  private _lock(path: string) {
    return acquireFileLock(path, {
      staleMs: this._staleLockMs,
      now: this._now,
      onStale: (lockPath, ageMs) => {
        this._logger.warn({ lockPath, ageMs }, "breaking stale wallet lock");
      },
      onLost: (lockPath) => {
        this._logger.warn({ lockPath }, "wallet lock was taken over before release");
      },
    });
  }

  private _commit(
    path: string,
    passphrase: string,
    bumpVersion: boolean,
    expectedVersion: number | undefined,
    produce: (body: LedgerBody, wallet: Wallet) => LedgerBody,
  ): Wallet {
    const lock = this._lock(path);
    try {
      const loaded = readDocument(path);
      if (expectedVersion !== undefined && loaded.version !== expectedVersion) {
        throw new ConflictError(
          `Wallet version is ${loaded.version}, expected ${expectedVersion}`,
        );
      }

      const key = deriveKey(passphrase, loaded.keyDerivation);
      const body = decryptBody(loaded, key);
      const candidate = produce(body, toWallet(loaded, body));

      const current = readDocument(path);
      if (
        current.version !== loaded.version ||
        current.encryptedBlob !== loaded.encryptedBlob
      ) {
        throw new ConflictError(
          `Wallet changed while being updated (version ${loaded.version} -> ${current.version})`,
        );
      }

      const header: WalletHeader = {
        ...headerOf(loaded),
        version: bumpVersion ? loaded.version + 1 : loaded.version,
      };
      const doc = this._write(path, header, candidate, key);
      this._logger.debug(
        { walletId: doc.walletId, version: doc.version, balance: candidate.balance },
        bumpVersion ? "wallet applied" : "wallet records updated",
      );
      return toWallet(doc, candidate);
    } finally {
      lock.release();
    }
  }

  private _write(path: string, header: WalletHeader, body: LedgerBody, key: Buffer): WalletDocument {
    const doc: WalletDocument = {
      ...header,
      encryptedBlob: sealWithKey(serializeBody(body), key, headerAssociatedData(header)),
      updatedAt: this._now().toISOString(),
    };
    writeFileAtomic(path, `${JSON.stringify(doc, null, 2)}\n`);
    return doc;
  }
}
