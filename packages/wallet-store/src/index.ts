/**
 * @linkvault/wallet-store — Encrypted wallet files with locked, atomic updates.
 */

export {
  WalletStore,
  DEFAULT_STALE_LOCK_MS,
  headerAssociatedData,
} from "./wallet-store.js";

export type {
  WalletStoreOptions,
  CreateOptions,
  ApplyOptions,
  BodyMutation,
  RecordsMutation,
} from "./wallet-store.js";

export { acquireFileLock } from "./file-lock.js";
export type { FileLock, FileLockOptions } from "./file-lock.js";

export { writeFileAtomic } from "./atomic-write.js";

export {
  TransactionRecordSchema,
  LedgerBodySchema,
  WalletDocumentSchema,
  parseWalletDocument,
  parseLedgerBody,
} from "./schema.js";
