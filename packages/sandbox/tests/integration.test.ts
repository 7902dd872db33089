/**
 * End-to-end runs of the coordinator against the sandbox.
 *
 * The marketplace client talks to the Hono app in process through
 * `app.request`; wallets live in a temporary directory.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { InsufficientFundsError, RemoteRejectionError } from "@linkvault/types";
import { MarketplaceClient } from "@linkvault/client";
import { TransactionCoordinator } from "@linkvault/coordinator";
import { WalletStore } from "@linkvault/wallet-store";
import { createTestApp, START } from "./setup.js";
import type { TestClock } from "./setup.js";
import type { AppInstance, CreateAppOptions } from "../src/app.js";

const PASSPHRASE = "test-secret";
const noopSleep = async (_ms: number) => {};

let dir: string;
let walletPath: string;
let store: WalletStore;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "linkvault-sandbox-"));
  walletPath = join(dir, "wallet.json");
  store = new WalletStore({ cost: { N: 1024, r: 8, p: 1 }, now: () => START });
  store.create(walletPath, "main", PASSPHRASE);
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

type Intercept = (url: string, clock: TestClock) => Response | undefined;

function connect(options: CreateAppOptions = {}, intercept?: Intercept) {
  const sandbox: AppInstance & { clock: TestClock } = createTestApp(options);
  const fetchFn: typeof fetch = async (input, init) => {
    const url = input instanceof Request ? input.url : input.toString();
    const early = intercept?.(url, sandbox.clock);
    if (early !== undefined) return early;
    return sandbox.app.request(input, init);
  };
  const gateway = new MarketplaceClient({
    baseUrl: "http://sandbox.local",
    fetchFn,
    sleepFn: noopSleep,
  });
  const coordinator = new TransactionCoordinator({
    store,
    gateway,
    now: sandbox.clock.now,
    sleepFn: noopSleep,
  });
  return { ...sandbox, coordinator, gateway };
}

const ctx = () => ({ walletPath, passphrase: PASSPHRASE });

describe("coordinator against the sandbox", () => {
  it("runs deposit, withdraw, overdraw and buy", async () => {
    const { coordinator, market } = connect();

    const deposited = await coordinator.deposit({ ...ctx(), idempotencyKey: "d-1", amount: 10000 });
    expect(deposited).toMatchObject({ balance: 10000, version: 2 });
    expect(deposited.record.remoteReference).toBe("dep_1");

    const withdrawn = await coordinator.withdraw({
      ...ctx(),
      idempotencyKey: "w-1",
      amount: 4000,
      destination: "acct-test",
    });
    expect(withdrawn).toMatchObject({ balance: 6000, version: 3 });

    await expect(
      coordinator.withdraw({ ...ctx(), idempotencyKey: "w-2", amount: 9000, destination: "acct-test" }),
    ).rejects.toThrow(InsufficientFundsError);

    const bought = await coordinator.buy({
      ...ctx(),
      idempotencyKey: "b-1",
      listingId: "lst_travel_01",
    });
    expect(bought.balance).toBe(0);
    expect(bought.version).toBe(4);
    expect(bought.record).toMatchObject({
      status: "confirmed",
      amount: 6000,
      remoteReference: "rsv_1",
      reservationExpiresAt: "2026-03-01T12:02:00.000Z",
    });
    expect(market.getReservation("rsv_1")?.status).toBe("confirmed");
    expect(market.searchListings({ topic: "travel" })).toEqual([]);
  });

  it("cancels the reservation when the balance cannot cover the price", async () => {
    const { coordinator, market } = connect();
    await coordinator.deposit({ ...ctx(), idempotencyKey: "d-1", amount: 3000 });

    const err: unknown = await coordinator
      .buy({ ...ctx(), idempotencyKey: "b-1", listingId: "lst_garden_01" })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(InsufficientFundsError);
    expect(err).toMatchObject({ balance: 3000, required: 4500 });
    expect(market.getReservation("rsv_1")?.status).toBe("cancelled");
    expect(market.searchListings({ topic: "gardening" }).map((l) => l.listingId)).toContain(
      "lst_garden_01",
    );

    const wallet = store.load(walletPath, PASSPHRASE);
    expect(wallet.balance).toBe(3000);
    expect(wallet.version).toBe(2);
    expect(wallet.transactions[1]?.status).toBe("rolled_back");
  });

  it("returns the funds when the reservation lapses before confirmation", async () => {
    const { coordinator } = connect({ reservationTtlMs: 1000 }, (url, clock) => {
      if (url.endsWith("/confirm")) clock.advance(1000);
      return undefined;
    });
    await coordinator.deposit({ ...ctx(), idempotencyKey: "d-1", amount: 10000 });

    const err: unknown = await coordinator
      .buy({ ...ctx(), idempotencyKey: "b-1", listingId: "lst_tech_02" })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RemoteRejectionError);
    expect(err).toMatchObject({ remoteCode: "RESERVATION_EXPIRED", status: 410 });

    const wallet = store.load(walletPath, PASSPHRASE);
    expect(wallet.balance).toBe(10000);
    expect(wallet.version).toBe(4);
    expect(wallet.transactions[1]).toMatchObject({
      status: "rolled_back",
      postedAtVersion: 3,
      reversedAtVersion: 4,
    });
  });

  it("retries a confirmation the server failed to answer", async () => {
    let failures = 1;
    const { coordinator, market } = connect({}, (url) => {
      if (url.endsWith("/confirm") && failures > 0) {
        failures -= 1;
        return new Response(
          JSON.stringify({ error: { code: "UNAVAILABLE", message: "try again" } }),
          { status: 503, headers: { "Content-Type": "application/json" } },
        );
      }
      return undefined;
    });
    await coordinator.deposit({ ...ctx(), idempotencyKey: "d-1", amount: 10000 });

    const bought = await coordinator.buy({
      ...ctx(),
      idempotencyKey: "b-1",
      listingId: "lst_food_01",
    });

    expect(bought.record.status).toBe("confirmed");
    expect(bought.balance).toBe(7000);
    expect(market.getReservation("rsv_1")?.orderId).toBe("ord_1");
  });

  it("credits a checkout deposit once the processor settles it", async () => {
    const { coordinator, market } = connect({ autoConfirmDeposits: false });

    const pending = await coordinator.deposit({ ...ctx(), idempotencyKey: "d-1", amount: 500 });
    expect(pending.record).toMatchObject({
      status: "pending",
      checkoutUrl: "https://checkout.sandbox.invalid/pay/dep_1",
    });
    expect(pending.balance).toBe(0);

    market.settleDeposit("dep_1", "confirmed");
    const report = await coordinator.reconcile(ctx());

    expect(report.resolved.map((e) => e.status)).toEqual(["confirmed"]);
    expect(coordinator.balance(ctx()).balance).toBe(500);
  });

  it("publishes a listing and finds it in search", async () => {
    const { coordinator, gateway } = connect();

    const sold = await coordinator.sell({
      ...ctx(),
      idempotencyKey: "s-1",
      sourceUrl: "https://mysite.example/post",
      targetUrl: "https://target.example/",
      price: 2500,
      anchor: "garden tools",
      topic: "gardening",
    });

    expect(sold.record).toMatchObject({ status: "confirmed", remoteReference: "lst_1" });
    expect(sold.balance).toBe(0);
    const found = await gateway.searchListings({ topic: "gardening", priceMax: 2500 });
    expect(found.map((l) => l.listingId)).toEqual(["lst_garden_02", "lst_1"]);
  });
});
