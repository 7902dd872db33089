/**
 * @linkvault/client — Marketplace Client.
 *
 * Typed methods over the marketplace HTTP API:
 * - Listing search and creation
 * - Reservation lifecycle (reserve, confirm, cancel)
 * - Deposits and payouts
 * - Domain lookup and spam score
 *
 * Financial calls derive a per-step Idempotency-Key from the caller's key
 * so a resumed protocol repeats exactly the same remote requests.
 */

import type { Listing, ListingFilter } from "@linkvault/types";
import { HttpClient } from "./http-client.js";
import type { HttpClientConfig } from "./http-client.js";
import type { CreateListingInput, MarketplaceGateway } from "./gateway.js";
import {
  CancellationSchema,
  DepositSchema,
  ListingListSchema,
  ListingSchema,
  LookupResultSchema,
  PayoutSchema,
  PurchaseConfirmationSchema,
  ReservationSchema,
  SpamScoreSchema,
} from "./schemas.js";
import type {
  Cancellation,
  Deposit,
  LookupResult,
  Payout,
  PurchaseConfirmation,
  Reservation,
  SpamScore,
} from "./schemas.js";

export class MarketplaceClient implements MarketplaceGateway {
  private readonly http: HttpClient;

  constructor(config: HttpClientConfig | HttpClient) {
    this.http = config instanceof HttpClient ? config : new HttpClient(config);
  }

  // ─── Listings ─────────────────────────────────────────────────────

  async searchListings(filter: ListingFilter): Promise<readonly Listing[]> {
    return this.http.get("/v1/listings", {
      schema: ListingListSchema,
      query: { dr_min: filter.drMin, price_max: filter.priceMax, topic: filter.topic },
    });
  }

  async createListing(input: CreateListingInput, idempotencyKey: string): Promise<Listing> {
    return this.http.post("/v1/listings", {
      schema: ListingSchema,
      body: input,
      idempotencyKey: `${idempotencyKey}:listing`,
    });
  }

  // ─── Reservations ─────────────────────────────────────────────────

  async reserveListing(
    listingId: string,
    walletId: string,
    idempotencyKey: string,
  ): Promise<Reservation> {
    return this.http.post(`/v1/listings/${encodeURIComponent(listingId)}/reservations`, {
      schema: ReservationSchema,
      body: { walletId },
      idempotencyKey: `${idempotencyKey}:reserve`,
    });
  }

  async confirmPurchase(
    reservationId: string,
    walletId: string,
    idempotencyKey: string,
  ): Promise<PurchaseConfirmation> {
    return this.http.post(`/v1/reservations/${encodeURIComponent(reservationId)}/confirm`, {
      schema: PurchaseConfirmationSchema,
      body: { walletId },
      idempotencyKey: `${idempotencyKey}:confirm`,
    });
  }

  async cancelReservation(
    reservationId: string,
    walletId: string,
    idempotencyKey: string,
  ): Promise<Cancellation> {
    return this.http.post(`/v1/reservations/${encodeURIComponent(reservationId)}/cancel`, {
      schema: CancellationSchema,
      body: { walletId },
      idempotencyKey: `${idempotencyKey}:cancel`,
    });
  }

  // ─── Funds ────────────────────────────────────────────────────────

  async initiateDeposit(walletId: string, amount: number, idempotencyKey: string): Promise<Deposit> {
    return this.http.post("/v1/deposits", {
      schema: DepositSchema,
      body: { walletId, amount },
      idempotencyKey: `${idempotencyKey}:deposit`,
    });
  }

  async getDeposit(depositId: string): Promise<Deposit> {
    return this.http.get(`/v1/deposits/${encodeURIComponent(depositId)}`, {
      schema: DepositSchema,
    });
  }

  async requestPayout(
    walletId: string,
    amount: number,
    destination: string,
    idempotencyKey: string,
  ): Promise<Payout> {
    return this.http.post("/v1/payouts", {
      schema: PayoutSchema,
      body: { walletId, amount, destination },
      idempotencyKey: `${idempotencyKey}:payout`,
    });
  }

  // ─── Domain tools ─────────────────────────────────────────────────

  async lookup(url: string): Promise<LookupResult> {
    return this.http.get("/v1/lookup", { schema: LookupResultSchema, query: { url } });
  }

  async spamScore(url: string): Promise<SpamScore> {
    return this.http.get("/v1/spam-score", { schema: SpamScoreSchema, query: { url } });
  }
}
