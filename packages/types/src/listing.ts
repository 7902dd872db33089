/**
 * Marketplace listing types.
 *
 * Listings are owned by the remote marketplace and fetched fresh for
 * every list/buy call; nothing here is persisted locally.
 */

export interface Listing {
  readonly listingId: string;
  readonly sourceUrl: string;
  readonly targetUrl: string;
  /** Minor currency units */
  readonly price: number;
  readonly domainRating: number;
  readonly topic: string;
  readonly sellerReference: string;
  readonly anchor?: string | undefined;
}

export interface ListingFilter {
  readonly drMin?: number | undefined;
  readonly priceMax?: number | undefined;
  readonly topic?: string | undefined;
}
