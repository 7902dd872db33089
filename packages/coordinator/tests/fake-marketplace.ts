/**
 * In-memory MarketplaceGateway for coordinator tests.
 *
 * Financial calls are idempotent per key like the real API. Failures can
 * be queued per method, either before the remote effect (request lost) or
 * after it (response lost).
 */

import type { Listing, ListingFilter } from "@linkvault/types";
import { RemoteRejectionError } from "@linkvault/types";
import type {
  Cancellation,
  CreateListingInput,
  Deposit,
  LookupResult,
  MarketplaceGateway,
  Payout,
  PurchaseConfirmation,
  Reservation,
  SpamScore,
} from "@linkvault/client";

export type GatewayMethod = keyof MarketplaceGateway;

interface QueuedFailure {
  readonly error: Error;
  readonly afterEffect: boolean;
}

export class FakeMarketplace implements MarketplaceGateway {
  readonly calls: GatewayMethod[] = [];
  readonly listings = new Map<string, Listing>();
  readonly cancelled = new Set<string>();

  depositStatus: Deposit["status"] = "confirmed";
  payoutStatus: Payout["status"] = "completed";
  /** Runs at the start of every call, e.g. to write to the wallet meanwhile */
  beforeCall: ((method: GatewayMethod) => void) | undefined = undefined;

  private readonly failures = new Map<GatewayMethod, QueuedFailure[]>();
  private readonly reservations = new Map<string, Reservation>();
  private readonly deposits = new Map<string, Deposit>();
  private readonly payouts = new Map<string, Payout>();
  private readonly created = new Map<string, Listing>();
  private seq = 0;

  addListing(listing: Listing): void {
    this.listings.set(listing.listingId, listing);
  }

  /** Fail the next call before it takes effect. */
  failNext(method: GatewayMethod, error: Error): void {
    this.queue(method, { error, afterEffect: false });
  }

  /** Let the next call take effect, then fail as if the response was lost. */
  loseResponse(method: GatewayMethod, error: Error): void {
    this.queue(method, { error, afterEffect: true });
  }

  count(method: GatewayMethod): number {
    return this.calls.filter((m) => m === method).length;
  }

  // ─── MarketplaceGateway ───────────────────────────────────────────

  async searchListings(filter: ListingFilter): Promise<readonly Listing[]> {
    this.enter("searchListings");
    return [...this.listings.values()].filter(
      (l) =>
        (filter.drMin === undefined || l.domainRating >= filter.drMin) &&
        (filter.priceMax === undefined || l.price <= filter.priceMax) &&
        (filter.topic === undefined || l.topic === filter.topic),
    );
  }

  async reserveListing(listingId: string, _walletId: string, key: string): Promise<Reservation> {
    const failure = this.enter("reserveListing");
    const listing = this.listings.get(listingId);
    if (listing === undefined) {
      throw new RemoteRejectionError("LISTING_NOT_FOUND", `Listing ${listingId} not found`, 404);
    }
    const reservation = this.reservations.get(key) ?? {
      reservationId: `rsv_${++this.seq}`,
      listingId,
      price: listing.price,
      expiresAt: "2026-06-01T00:02:00.000Z",
    };
    this.reservations.set(key, reservation);
    return this.leave(failure, reservation);
  }

  async confirmPurchase(
    reservationId: string,
    _walletId: string,
    _key: string,
  ): Promise<PurchaseConfirmation> {
    const failure = this.enter("confirmPurchase");
    return this.leave(failure, {
      reservationId,
      orderId: `ord_${reservationId}`,
      status: "confirmed" as const,
    });
  }

  async cancelReservation(
    reservationId: string,
    _walletId: string,
    _key: string,
  ): Promise<Cancellation> {
    const failure = this.enter("cancelReservation");
    this.cancelled.add(reservationId);
    return this.leave(failure, { reservationId, status: "cancelled" as const });
  }

  async initiateDeposit(_walletId: string, _amount: number, key: string): Promise<Deposit> {
    const failure = this.enter("initiateDeposit");
    const existing = this.deposits.get(key);
    const deposit = existing ?? this.depositView(`dep_${++this.seq}`);
    this.deposits.set(key, deposit);
    return this.leave(failure, deposit);
  }

  async getDeposit(depositId: string): Promise<Deposit> {
    const failure = this.enter("getDeposit");
    return this.leave(failure, this.depositView(depositId));
  }

  async requestPayout(
    _walletId: string,
    _amount: number,
    _destination: string,
    key: string,
  ): Promise<Payout> {
    const failure = this.enter("requestPayout");
    const payoutId = this.payouts.get(key)?.payoutId ?? `po_${++this.seq}`;
    const payout: Payout = { payoutId, status: this.payoutStatus };
    this.payouts.set(key, payout);
    return this.leave(failure, payout);
  }

  async createListing(input: CreateListingInput, key: string): Promise<Listing> {
    const failure = this.enter("createListing");
    const listing = this.created.get(key) ?? {
      listingId: `lst_new_${++this.seq}`,
      sourceUrl: input.sourceUrl,
      targetUrl: input.targetUrl,
      price: input.price,
      domainRating: 0,
      topic: input.topic ?? "general",
      sellerReference: input.walletId,
      anchor: input.anchor,
    };
    this.created.set(key, listing);
    return this.leave(failure, listing);
  }

  async lookup(url: string): Promise<LookupResult> {
    this.enter("lookup");
    return { url };
  }

  async spamScore(url: string): Promise<SpamScore> {
    this.enter("spamScore");
    return { url, spamScore: 1, riskLevel: "low", spamFlags: [], lastChecked: "2026-06-01T00:00:00.000Z" };
  }

  // ─── Internals ────────────────────────────────────────────────────

  private depositView(depositId: string): Deposit {
    return this.depositStatus === "pending"
      ? { depositId, status: "pending", checkoutUrl: `https://pay.example/c/${depositId}` }
      : { depositId, status: this.depositStatus };
  }

  private queue(method: GatewayMethod, failure: QueuedFailure): void {
    const queued = this.failures.get(method) ?? [];
    queued.push(failure);
    this.failures.set(method, queued);
  }

  private enter(method: GatewayMethod): QueuedFailure | undefined {
    this.calls.push(method);
    this.beforeCall?.(method);
    const failure = this.failures.get(method)?.shift();
    if (failure !== undefined && !failure.afterEffect) {
      throw failure.error;
    }
    return failure;
  }

  private leave<T>(failure: QueuedFailure | undefined, value: T): T {
    if (failure !== undefined) {
      throw failure.error;
    }
    return value;
  }
}
