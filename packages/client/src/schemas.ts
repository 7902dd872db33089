/**
 * Response shapes of the marketplace API.
 *
 * Every payload is validated before the coordinator acts on it.
 */

import { z } from "zod";

const MinorUnits = z.number().int().min(0).max(Number.MAX_SAFE_INTEGER);

export const ListingSchema = z.object({
  listingId: z.string().min(1),
  sourceUrl: z.string(),
  targetUrl: z.string(),
  price: MinorUnits,
  domainRating: z.number(),
  topic: z.string(),
  sellerReference: z.string(),
  anchor: z.string().optional(),
});

export const ListingListSchema = z.array(ListingSchema);

export const ReservationSchema = z.object({
  reservationId: z.string().min(1),
  listingId: z.string().min(1),
  price: MinorUnits,
  expiresAt: z.string(),
});

export const PurchaseConfirmationSchema = z.object({
  reservationId: z.string().min(1),
  orderId: z.string().min(1),
  status: z.literal("confirmed"),
});

export const CancellationSchema = z.object({
  reservationId: z.string().min(1),
  status: z.literal("cancelled"),
});

export const DepositSchema = z.object({
  depositId: z.string().min(1),
  status: z.enum(["pending", "confirmed", "failed"]),
  checkoutUrl: z.string().optional(),
});

export const PayoutSchema = z.object({
  payoutId: z.string().min(1),
  status: z.enum(["completed", "processing", "failed"]),
});

export const LookupResultSchema = z.record(z.unknown());

export const SpamScoreSchema = z.object({
  url: z.string(),
  spamScore: z.number(),
  riskLevel: z.string(),
  spamFlags: z.array(z.string()),
  lastChecked: z.string(),
});

export const ErrorEnvelopeSchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
  }),
});

export type Reservation = z.infer<typeof ReservationSchema>;
export type PurchaseConfirmation = z.infer<typeof PurchaseConfirmationSchema>;
export type Cancellation = z.infer<typeof CancellationSchema>;
export type Deposit = z.infer<typeof DepositSchema>;
export type Payout = z.infer<typeof PayoutSchema>;
export type LookupResult = z.infer<typeof LookupResultSchema>;
export type SpamScore = z.infer<typeof SpamScoreSchema>;
