/**
 * In-memory marketplace state.
 *
 * Holds listings, reservations, deposits and payouts for one sandbox
 * process. Every refusal is a MarketError carrying the status and code
 * the HTTP API answers with.
 */

import { createHash } from "node:crypto";
import type { Listing, ListingFilter } from "@linkvault/types";
import { MarketError } from "../types/error.js";
import { loadSeedListings } from "./seed.js";

// =============================================================================
// Types
// =============================================================================

export interface SandboxMarketOptions {
  /** How long a reservation holds a listing. Default: 120000 */
  readonly reservationTtlMs?: number | undefined;
  /** Confirm deposits at once instead of leaving them pending. Default: true */
  readonly autoConfirmDeposits?: boolean | undefined;
  /** Base of the checkout URLs handed out for pending deposits */
  readonly checkoutBaseUrl?: string | undefined;
  /** Listings to start with. Default: the bundled seed listings */
  readonly listings?: readonly Listing[] | undefined;
  readonly now?: (() => Date) | undefined;
}

export type ReservationStatus = "held" | "confirmed" | "cancelled";

export interface ReservationState {
  readonly reservationId: string;
  readonly listingId: string;
  readonly walletId: string;
  readonly price: number;
  readonly expiresAt: Date;
  status: ReservationStatus;
  orderId?: string | undefined;
}

export type DepositStatus = "pending" | "confirmed" | "failed";

export interface DepositState {
  readonly depositId: string;
  readonly walletId: string;
  readonly amount: number;
  status: DepositStatus;
  readonly checkoutUrl?: string | undefined;
}

export interface PayoutState {
  readonly payoutId: string;
  readonly walletId: string;
  readonly amount: number;
  readonly destination: string;
  readonly status: "completed";
}

export interface NewListing {
  readonly walletId: string;
  readonly sourceUrl: string;
  readonly targetUrl: string;
  readonly price: number;
  readonly anchor: string;
  readonly topic?: string | undefined;
}

export interface DomainMetrics {
  readonly url: string;
  readonly domain: string;
  readonly domainRating: number;
  readonly referringDomains: number;
  readonly organicTraffic: number;
  readonly lastCrawled: string;
}

export interface SpamReport {
  readonly url: string;
  readonly spamScore: number;
  readonly riskLevel: "low" | "medium" | "high";
  readonly spamFlags: readonly string[];
  readonly lastChecked: string;
}

interface ListingState {
  readonly listing: Listing;
  soldTo?: string | undefined;
}

export const DEFAULT_RESERVATION_TTL_MS = 120_000;

// =============================================================================
// Helpers
// =============================================================================

function domainOf(url: string): string {
  const withoutScheme = url.replace(/^[a-z][a-z0-9+.-]*:\/\//i, "");
  const host = withoutScheme.split(/[/?#]/, 1)[0] ?? "";
  return host.toLowerCase();
}

/** Deterministic pseudo-metrics so repeated calls agree. */
function digestOf(domain: string): Buffer {
  return createHash("sha256").update(domain).digest();
}

// =============================================================================
// Market
// =============================================================================

export class SandboxMarket {
  private readonly _listings = new Map<string, ListingState>();
  private readonly _reservations = new Map<string, ReservationState>();
  private readonly _deposits = new Map<string, DepositState>();
  private readonly _payouts = new Map<string, PayoutState>();
  private readonly _sequences = new Map<string, number>();
  private readonly _ttlMs: number;
  private readonly _autoConfirm: boolean;
  private readonly _checkoutBaseUrl: string;
  private readonly _now: () => Date;

  constructor(options: SandboxMarketOptions = {}) {
    this._ttlMs = options.reservationTtlMs ?? DEFAULT_RESERVATION_TTL_MS;
    this._autoConfirm = options.autoConfirmDeposits ?? true;
    this._checkoutBaseUrl = options.checkoutBaseUrl ?? "https://checkout.sandbox.invalid";
    this._now = options.now ?? (() => new Date());

    for (const listing of options.listings ?? loadSeedListings()) {
      this._listings.set(listing.listingId, { listing });
    }
  }

  // ─── Listings ─────────────────────────────────────────────────────

  /** Listings that are neither sold nor held by a live reservation. */
  searchListings(filter: ListingFilter = {}): readonly Listing[] {
    const topic = filter.topic?.toLowerCase();
    const result: Listing[] = [];
    for (const state of this._listings.values()) {
      const { listing } = state;
      if (!this.isAvailable(state)) continue;
      if (filter.drMin !== undefined && listing.domainRating < filter.drMin) continue;
      if (filter.priceMax !== undefined && listing.price > filter.priceMax) continue;
      if (topic !== undefined && listing.topic.toLowerCase() !== topic) continue;
      result.push(listing);
    }
    return result;
  }

  createListing(input: NewListing): Listing {
    const listing: Listing = {
      listingId: this.nextId("lst"),
      sourceUrl: input.sourceUrl,
      targetUrl: input.targetUrl,
      price: input.price,
      domainRating: this.lookup(input.sourceUrl).domainRating,
      topic: input.topic ?? "general",
      sellerReference: `seller_${input.walletId.slice(0, 8)}`,
      anchor: input.anchor,
    };
    this._listings.set(listing.listingId, { listing });
    return listing;
  }

  // ─── Reservations ─────────────────────────────────────────────────

  reserve(listingId: string, walletId: string): ReservationState {
    const state = this._listings.get(listingId);
    if (state === undefined) {
      throw new MarketError("LISTING_NOT_FOUND", `Listing ${listingId} not found`, 404);
    }
    if (state.soldTo !== undefined) {
      throw new MarketError("LISTING_UNAVAILABLE", `Listing ${listingId} has been sold`, 409);
    }
    if (this.activeHold(listingId) !== undefined) {
      throw new MarketError("LISTING_UNAVAILABLE", `Listing ${listingId} is reserved`, 409);
    }

    const reservation: ReservationState = {
      reservationId: this.nextId("rsv"),
      listingId,
      walletId,
      price: state.listing.price,
      expiresAt: new Date(this._now().getTime() + this._ttlMs),
      status: "held",
    };
    this._reservations.set(reservation.reservationId, reservation);
    return reservation;
  }

  /**
   * Confirm a held reservation. Confirming twice returns the same order.
   */
  confirm(reservationId: string, walletId: string): ReservationState {
    const reservation = this.ownedReservation(reservationId, walletId);
    if (reservation.status === "confirmed") {
      return reservation;
    }
    if (reservation.status === "cancelled") {
      throw new MarketError(
        "RESERVATION_CANCELLED",
        `Reservation ${reservationId} was cancelled`,
        409,
      );
    }
    if (this._now().getTime() >= reservation.expiresAt.getTime()) {
      throw new MarketError(
        "RESERVATION_EXPIRED",
        `Reservation ${reservationId} expired at ${reservation.expiresAt.toISOString()}`,
        410,
      );
    }

    reservation.status = "confirmed";
    reservation.orderId = this.nextId("ord");
    const listing = this._listings.get(reservation.listingId);
    if (listing !== undefined) {
      listing.soldTo = walletId;
    }
    return reservation;
  }

  /** Release a reservation. Cancelling twice is a no-op. */
  cancel(reservationId: string, walletId: string): ReservationState {
    const reservation = this.ownedReservation(reservationId, walletId);
    if (reservation.status === "confirmed") {
      throw new MarketError(
        "RESERVATION_CONFIRMED",
        `Reservation ${reservationId} is already confirmed`,
        409,
      );
    }
    reservation.status = "cancelled";
    return reservation;
  }

  getReservation(reservationId: string): ReservationState | undefined {
    return this._reservations.get(reservationId);
  }

  // ─── Funds ────────────────────────────────────────────────────────

  initiateDeposit(walletId: string, amount: number): DepositState {
    const depositId = this.nextId("dep");
    const deposit: DepositState = this._autoConfirm
      ? { depositId, walletId, amount, status: "confirmed" }
      : {
          depositId,
          walletId,
          amount,
          status: "pending",
          checkoutUrl: `${this._checkoutBaseUrl}/pay/${depositId}`,
        };
    this._deposits.set(depositId, deposit);
    return deposit;
  }

  getDeposit(depositId: string): DepositState {
    const deposit = this._deposits.get(depositId);
    if (deposit === undefined) {
      throw new MarketError("DEPOSIT_NOT_FOUND", `Deposit ${depositId} not found`, 404);
    }
    return deposit;
  }

  /** Stand-in for the payment processor finishing a checkout. */
  settleDeposit(depositId: string, status: "confirmed" | "failed"): DepositState {
    const deposit = this.getDeposit(depositId);
    if (deposit.status === "pending") {
      deposit.status = status;
    }
    return deposit;
  }

  requestPayout(walletId: string, amount: number, destination: string): PayoutState {
    const payout: PayoutState = {
      payoutId: this.nextId("po"),
      walletId,
      amount,
      destination,
      status: "completed",
    };
    this._payouts.set(payout.payoutId, payout);
    return payout;
  }

  // ─── Domain tools ─────────────────────────────────────────────────

  lookup(url: string): DomainMetrics {
    const domain = domainOf(url);
    const digest = digestOf(domain);
    return {
      url,
      domain,
      domainRating: digest.readUInt8(0) % 101,
      referringDomains: digest.readUInt16BE(1) % 5000,
      organicTraffic: digest.readUInt32BE(3) % 250_000,
      lastCrawled: this._now().toISOString(),
    };
  }

  spamScore(url: string): SpamReport {
    const score = digestOf(domainOf(url)).readUInt8(7) % 101;
    const flags: string[] = [];
    if (score >= 30) flags.push("thin_content");
    if (score >= 60) flags.push("link_farm_pattern");
    if (score >= 85) flags.push("excessive_outbound_links");
    return {
      url,
      spamScore: score,
      riskLevel: score >= 60 ? "high" : score >= 30 ? "medium" : "low",
      spamFlags: flags,
      lastChecked: this._now().toISOString(),
    };
  }

  // ─── Internal ─────────────────────────────────────────────────────

  private isAvailable(state: ListingState): boolean {
    return state.soldTo === undefined && this.activeHold(state.listing.listingId) === undefined;
  }

  private activeHold(listingId: string): ReservationState | undefined {
    const now = this._now().getTime();
    for (const reservation of this._reservations.values()) {
      if (
        reservation.listingId === listingId &&
        reservation.status === "held" &&
        reservation.expiresAt.getTime() > now
      ) {
        return reservation;
      }
    }
    return undefined;
  }

  private ownedReservation(reservationId: string, walletId: string): ReservationState {
    const reservation = this._reservations.get(reservationId);
    if (reservation === undefined) {
      throw new MarketError(
        "RESERVATION_NOT_FOUND",
        `Reservation ${reservationId} not found`,
        404,
      );
    }
    if (reservation.walletId !== walletId) {
      throw new MarketError(
        "FORBIDDEN",
        `Reservation ${reservationId} belongs to another wallet`,
        403,
      );
    }
    return reservation;
  }

  private nextId(prefix: string): string {
    const next = (this._sequences.get(prefix) ?? 0) + 1;
    this._sequences.set(prefix, next);
    return `${prefix}_${next}`;
  }
}
