/**
 * Wallet file and ledger body schemas.
 *
 * Everything read from disk is validated here before it is trusted;
 * failures become SchemaError with one issue per offending path.
 */

import { z } from "zod";
import type { ZodError } from "zod";
import type { LedgerBody, WalletDocument } from "@linkvault/types";
import { SchemaError } from "@linkvault/types";
import { assertKeyDerivationParams } from "@linkvault/envelope";

const MinorUnits = z.number().int().min(0).max(Number.MAX_SAFE_INTEGER);
const Version = z.number().int().min(1).max(Number.MAX_SAFE_INTEGER);

export const TransactionRecordSchema = z.object({
  idempotencyKey: z.string().min(1),
  walletId: z.string().min(1),
  kind: z.enum(["deposit", "withdraw", "buy", "sell"]),
  amount: MinorUnits,
  counterpartyReference: z.string(),
  status: z.enum(["pending", "reserved", "confirmed", "failed", "rolled_back"]),
  createdAt: z.string().min(1),
  completedAt: z.string().min(1).optional(),
  postedAtVersion: Version.optional(),
  reversedAtVersion: Version.optional(),
  remoteReference: z.string().min(1).optional(),
  checkoutUrl: z.string().min(1).optional(),
  reservationExpiresAt: z.string().min(1).optional(),
  failureReason: z.string().optional(),
  failure: z
    .discriminatedUnion("code", [
      z.object({ code: z.literal("INSUFFICIENT_FUNDS"), balance: MinorUnits, required: MinorUnits }),
      z.object({
        code: z.literal("REMOTE_REJECTED"),
        remoteCode: z.string().min(1),
        status: z.number().int().min(0),
      }),
    ])
    .optional(),
  details: z.record(z.string()).optional(),
});

export const LedgerBodySchema = z
  .object({
    balance: MinorUnits,
    transactions: z.array(TransactionRecordSchema),
  })
  .superRefine((body, ctx) => {
    const seen = new Set<string>();
    body.transactions.forEach((record, index) => {
      if (seen.has(record.idempotencyKey)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["transactions", index, "idempotencyKey"],
          message: `Duplicate idempotency key "${record.idempotencyKey}"`,
        });
      }
      seen.add(record.idempotencyKey);
    });
  });

export const WalletDocumentSchema = z.object({
  format: z.literal(1),
  walletId: z.string().min(1),
  name: z.string(),
  version: Version,
  keyDerivation: z.object({
    algorithm: z.string(),
    salt: z.string(),
    cost: z.object({ N: z.number(), r: z.number(), p: z.number() }),
  }),
  cipher: z.literal("aes-256-gcm"),
  encryptedBlob: z.string().min(1),
  updatedAt: z.string(),
});

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

/**
 * Validate the outer wallet document.
 */
export function parseWalletDocument(value: unknown): WalletDocument {
  const result = WalletDocumentSchema.safeParse(value);
  if (!result.success) {
    throw new SchemaError("Wallet file is not a valid wallet document", formatIssues(result.error));
  }
  return {
    ...result.data,
    keyDerivation: assertKeyDerivationParams(result.data.keyDerivation),
  };
}

/**
 * Validate a decrypted (or candidate) ledger body.
 */
export function parseLedgerBody(value: unknown): LedgerBody {
  const result = LedgerBodySchema.safeParse(value);
  if (!result.success) {
    throw new SchemaError("Ledger body is structurally invalid", formatIssues(result.error));
  }
  return result.data;
}
