/**
 * @linkvault/envelope — Passphrase-keyed authenticated encryption.
 */

export {
  DEFAULT_SCRYPT_COST,
  createKeyDerivationParams,
  assertKeyDerivationParams,
  deriveKey,
  sealWithKey,
  openWithKey,
  seal,
  open,
} from "./envelope.js";

export type { SealOptions, OpenOptions, SealedEnvelope } from "./envelope.js";
