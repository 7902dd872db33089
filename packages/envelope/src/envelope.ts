/**
 * @linkvault/envelope — Symmetric encryption of ledger bodies at rest.
 *
 * Key derivation: scrypt (memory-hard) over the passphrase with a
 * per-wallet random salt and persisted cost parameters.
 * Cipher: AES-256-GCM with a fresh 12-byte nonce per seal.
 *
 * Blob layout (base64): nonce(12) ‖ ciphertext ‖ tag(16)
 *
 * There is no password-check path: a wrong passphrase surfaces as an
 * authentication failure of the GCM tag, which OpenSSL verifies in
 * constant time.
 */

import {
  createCipheriv,
  createDecipheriv,
  randomBytes,
  scryptSync,
} from "node:crypto";
import type { KeyDerivationParams, ScryptCost } from "@linkvault/types";
import { DecryptionError, SchemaError, ValidationError } from "@linkvault/types";

// =============================================================================
// Constants
// =============================================================================

const CIPHER = "aes-256-gcm";
const KEY_BYTES = 32;
const NONCE_BYTES = 12;
const TAG_BYTES = 16;
const SALT_BYTES = 16;

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

/** Default scrypt cost: N=2^15, r=8, p=1 (~32 MiB, ~100 ms). */
export const DEFAULT_SCRYPT_COST: ScryptCost = { N: 32768, r: 8, p: 1 };

const COST_LIMITS = {
  minN: 1024,
  maxN: 1048576,
  maxR: 32,
  maxP: 16,
} as const;

// =============================================================================
// Types
// =============================================================================

export interface SealOptions {
  /** Reuse persisted params (same salt) instead of generating new ones */
  readonly params?: KeyDerivationParams | undefined;
  /** Cost for newly generated params. Ignored when `params` is given. */
  readonly cost?: ScryptCost | undefined;
  /** Authenticated, unencrypted context (e.g. the canonical wallet header) */
  readonly associatedData?: string | undefined;
}

export interface OpenOptions {
  readonly associatedData?: string | undefined;
}

export interface SealedEnvelope {
  readonly blob: string;
  readonly params: KeyDerivationParams;
}

// =============================================================================
// Parameters
// =============================================================================

function isPowerOfTwo(n: number): boolean {
  return Number.isInteger(n) && n > 0 && (n & (n - 1)) === 0;
}

function costIssues(cost: ScryptCost): string[] {
  const issues: string[] = [];
  if (!isPowerOfTwo(cost.N) || cost.N < COST_LIMITS.minN || cost.N > COST_LIMITS.maxN) {
    issues.push(`cost.N must be a power of two between ${COST_LIMITS.minN} and ${COST_LIMITS.maxN}`);
  }
  if (!Number.isInteger(cost.r) || cost.r < 1 || cost.r > COST_LIMITS.maxR) {
    issues.push(`cost.r must be an integer between 1 and ${COST_LIMITS.maxR}`);
  }
  if (!Number.isInteger(cost.p) || cost.p < 1 || cost.p > COST_LIMITS.maxP) {
    issues.push(`cost.p must be an integer between 1 and ${COST_LIMITS.maxP}`);
  }
  return issues;
}

/**
 * Generate fresh key-derivation parameters with a random salt.
 */
export function createKeyDerivationParams(
  cost: ScryptCost = DEFAULT_SCRYPT_COST,
): KeyDerivationParams {
  const issues = costIssues(cost);
  if (issues.length > 0) {
    throw new ValidationError(`Invalid scrypt cost: ${issues.join("; ")}`, "cost");
  }
  return {
    algorithm: "scrypt",
    salt: randomBytes(SALT_BYTES).toString("base64"),
    cost: { N: cost.N, r: cost.r, p: cost.p },
  };
}

function field(obj: object, key: string): unknown {
  return Object.prototype.hasOwnProperty.call(obj, key) ? Reflect.get(obj, key) : undefined;
}

/**
 * Validate persisted key-derivation parameters read from disk.
 *
 * @throws SchemaError if the algorithm is unknown or the cost is out of range
 */
export function assertKeyDerivationParams(value: unknown): KeyDerivationParams {
  if (value === null || typeof value !== "object") {
    throw new SchemaError("Key derivation parameters must be an object");
  }
  const algorithm = field(value, "algorithm");
  if (algorithm !== "scrypt") {
    throw new SchemaError(`Unsupported key derivation algorithm: ${String(algorithm)}`);
  }
  const salt = field(value, "salt");
  if (typeof salt !== "string" || !BASE64.test(salt) || salt.length === 0) {
    throw new SchemaError("Key derivation salt must be a non-empty base64 string");
  }
  const cost = field(value, "cost");
  if (cost === null || typeof cost !== "object") {
    throw new SchemaError("Key derivation cost must be an object");
  }
  const N = field(cost, "N");
  const r = field(cost, "r");
  const p = field(cost, "p");
  if (typeof N !== "number" || typeof r !== "number" || typeof p !== "number") {
    throw new SchemaError("Key derivation cost must contain numeric N, r and p");
  }
  const parsed: ScryptCost = { N, r, p };
  const issues = costIssues(parsed);
  if (issues.length > 0) {
    throw new SchemaError("Invalid key derivation cost", issues);
  }
  return { algorithm: "scrypt", salt, cost: parsed };
}

// =============================================================================
// Key Derivation
// =============================================================================

/**
 * Derive the 256-bit wallet key from a passphrase.
 */
export function deriveKey(passphrase: string, params: KeyDerivationParams): Buffer {
  if (passphrase.length === 0) {
    throw new ValidationError("Passphrase must not be empty", "passphrase");
  }
  const { N, r, p } = params.cost;
  return scryptSync(passphrase.normalize("NFKC"), Buffer.from(params.salt, "base64"), KEY_BYTES, {
    N,
    r,
    p,
    maxmem: 256 * N * r,
  });
}

// =============================================================================
// Seal / Open
// =============================================================================

export function sealWithKey(
  plaintext: string,
  key: Buffer,
  associatedData?: string,
): string {
  const nonce = randomBytes(NONCE_BYTES);
  const cipher = createCipheriv(CIPHER, key, nonce, { authTagLength: TAG_BYTES });
  if (associatedData !== undefined) {
    cipher.setAAD(Buffer.from(associatedData, "utf-8"));
  }
  const ciphertext = Buffer.concat([cipher.update(plaintext, "utf-8"), cipher.final()]);
  const tag = cipher.getAuthTag();
  return Buffer.concat([nonce, ciphertext, tag]).toString("base64");
}

/**
 * @throws DecryptionError on a malformed blob or failed authentication
 */
export function openWithKey(
  blob: string,
  key: Buffer,
  associatedData?: string,
): string {
  if (!BASE64.test(blob)) {
    throw new DecryptionError("Encrypted blob is not valid base64");
  }
  const raw = Buffer.from(blob, "base64");
  if (raw.length < NONCE_BYTES + TAG_BYTES) {
    throw new DecryptionError("Encrypted blob is truncated");
  }

  const nonce = raw.subarray(0, NONCE_BYTES);
  const tag = raw.subarray(raw.length - TAG_BYTES);
  const ciphertext = raw.subarray(NONCE_BYTES, raw.length - TAG_BYTES);

  const decipher = createDecipheriv(CIPHER, key, nonce, { authTagLength: TAG_BYTES });
  decipher.setAuthTag(tag);
  if (associatedData !== undefined) {
    decipher.setAAD(Buffer.from(associatedData, "utf-8"));
  }

  try {
    return Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString("utf-8");
  } catch {
    throw new DecryptionError();
  }
}

/**
 * Seal a plaintext under a passphrase-derived key.
 *
 * Pass the wallet's existing params to keep its salt; otherwise new
 * params are generated with `options.cost`.
 */
export function seal(
  plaintext: string,
  passphrase: string,
  options: SealOptions = {},
): SealedEnvelope {
  const params = options.params ?? createKeyDerivationParams(options.cost);
  const key = deriveKey(passphrase, params);
  return {
    blob: sealWithKey(plaintext, key, options.associatedData),
    params,
  };
}

/**
 * Open a sealed blob.
 *
 * @throws DecryptionError on wrong passphrase, tampering or corruption
 */
export function open(
  blob: string,
  params: KeyDerivationParams,
  passphrase: string,
  options: OpenOptions = {},
): string {
  const key = deriveKey(passphrase, params);
  return openWithKey(blob, key, options.associatedData);
}
