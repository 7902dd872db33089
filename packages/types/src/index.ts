/**
 * @linkvault/types — Shared domain types for the linkvault stack.
 *
 * Design rules:
 * - All types are readonly
 * - Amounts are integers in minor currency units, never floats
 * - Errors are classes with a stable `code`
 */

export type {
  TransactionKind,
  TransactionStatus,
  TransactionRecord,
  TransactionPatch,
  RecordedFailure,
} from "./transaction.js";

export type {
  KeyDerivationAlgorithm,
  ScryptCost,
  KeyDerivationParams,
  LedgerBody,
  WalletHeader,
  WalletDocument,
  Wallet,
} from "./wallet.js";

export type { Listing, ListingFilter } from "./listing.js";

export type { LinkVaultErrorCode, SettlingError } from "./errors.js";
export {
  LinkVaultError,
  ValidationError,
  DecryptionError,
  SchemaError,
  InsufficientFundsError,
  ConflictError,
  NetworkError,
  RemoteRejectionError,
  InvalidTransitionError,
  AlreadyExistsError,
  NotFoundError,
  isLinkVaultError,
  recordedFailure,
  errorFromFailure,
} from "./errors.js";

export {
  isTransactionKind,
  isTransactionStatus,
  isTerminalStatus,
  isMinorUnits,
  isTransactionRecord,
} from "./guards.js";
