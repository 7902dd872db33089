/**
 * Request shapes accepted by the sandbox API.
 */

import { z } from "zod";

const Amount = z.number().int().positive().max(Number.MAX_SAFE_INTEGER);
const WalletId = z.string().min(1);

export const WalletRefSchema = z.object({ walletId: WalletId });

export const CreateDepositSchema = z.object({
  walletId: WalletId,
  amount: Amount,
});

export const CreatePayoutSchema = z.object({
  walletId: WalletId,
  amount: Amount,
  destination: z.string().min(1),
});

export const CreateListingSchema = z.object({
  walletId: WalletId,
  sourceUrl: z.string().min(1),
  targetUrl: z.string().min(1),
  price: Amount,
  anchor: z.string().min(1),
  topic: z.string().min(1).optional(),
});

const QueryNumber = z.coerce.number().finite().min(0);

export const ListingQuerySchema = z.object({
  dr_min: QueryNumber.optional(),
  price_max: QueryNumber.optional(),
  topic: z.string().min(1).optional(),
});

export const UrlQuerySchema = z.object({
  url: z.string().min(1),
});

export type CreateListingDto = z.infer<typeof CreateListingSchema>;
export type ListingQuery = z.infer<typeof ListingQuerySchema>;
