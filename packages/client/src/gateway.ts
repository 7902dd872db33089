/**
 * The marketplace as seen by the coordinator.
 *
 * MarketplaceClient is the HTTP implementation; tests substitute fakes.
 * Every call that can move money takes the caller's idempotency key and
 * must be safe to repeat with it.
 */

import type { Listing, ListingFilter } from "@linkvault/types";
import type {
  Cancellation,
  Deposit,
  LookupResult,
  Payout,
  PurchaseConfirmation,
  Reservation,
  SpamScore,
} from "./schemas.js";

export interface CreateListingInput {
  readonly walletId: string;
  readonly sourceUrl: string;
  readonly targetUrl: string;
  readonly price: number;
  readonly anchor: string;
  readonly topic?: string | undefined;
}

export interface MarketplaceGateway {
  searchListings(filter: ListingFilter): Promise<readonly Listing[]>;
  reserveListing(listingId: string, walletId: string, idempotencyKey: string): Promise<Reservation>;
  confirmPurchase(
    reservationId: string,
    walletId: string,
    idempotencyKey: string,
  ): Promise<PurchaseConfirmation>;
  cancelReservation(
    reservationId: string,
    walletId: string,
    idempotencyKey: string,
  ): Promise<Cancellation>;
  initiateDeposit(walletId: string, amount: number, idempotencyKey: string): Promise<Deposit>;
  getDeposit(depositId: string): Promise<Deposit>;
  requestPayout(
    walletId: string,
    amount: number,
    destination: string,
    idempotencyKey: string,
  ): Promise<Payout>;
  createListing(input: CreateListingInput, idempotencyKey: string): Promise<Listing>;
  lookup(url: string): Promise<LookupResult>;
  spamScore(url: string): Promise<SpamScore>;
}
