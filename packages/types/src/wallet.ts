/**
 * Wallet Types
 *
 * A wallet is a single-owner ledger persisted as one encrypted file.
 * The header travels in the clear (and is authenticated); the body
 * (balance + transactions) is only ever stored sealed.
 */

import type { TransactionRecord } from "./transaction.js";

/** Key-derivation algorithms understood by the envelope. */
export type KeyDerivationAlgorithm = "scrypt";

/**
 * scrypt cost parameters.
 * N must be a power of two; memory use is roughly 128 * N * r bytes.
 */
export interface ScryptCost {
  readonly N: number;
  readonly r: number;
  readonly p: number;
}

/**
 * Persisted key-derivation parameters.
 * The salt is base64; it is generated once per wallet.
 */
export interface KeyDerivationParams {
  readonly algorithm: KeyDerivationAlgorithm;
  readonly salt: string;
  readonly cost: ScryptCost;
}

/** Decrypted ledger body. */
export interface LedgerBody {
  /** Non-negative integer, minor currency units */
  readonly balance: number;
  readonly transactions: readonly TransactionRecord[];
}

/**
 * Plaintext header of a wallet file.
 * Bound to the ciphertext as associated data.
 */
export interface WalletHeader {
  readonly format: 1;
  readonly walletId: string;
  readonly name: string;
  readonly version: number;
  readonly keyDerivation: KeyDerivationParams;
  readonly cipher: "aes-256-gcm";
}

/** On-disk wallet document. */
export interface WalletDocument extends WalletHeader {
  /** base64(nonce ‖ ciphertext ‖ tag) */
  readonly encryptedBlob: string;
  readonly updatedAt: string;
}

/**
 * An opened wallet: header plus decrypted body.
 */
export interface Wallet {
  readonly walletId: string;
  readonly name: string;
  readonly version: number;
  readonly balance: number;
  readonly transactions: readonly TransactionRecord[];
  readonly keyDerivation: KeyDerivationParams;
  readonly updatedAt: string;
}
