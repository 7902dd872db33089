/**
 * Verifies:
 * - POST with Idempotency-Key replays the stored response
 * - Replayed responses carry X-Idempotent-Replay
 * - Refusals are not stored
 * - A key reused with another body is refused
 * - TTL expiry evicts entries
 */

import { describe, it, expect } from "vitest";
import { createTestApp, jsonRequest, readData } from "../setup.js";
import { InMemoryIdempotencyStore } from "../../src/middleware/idempotency.js";

describe("idempotency middleware", () => {
  it("replays a reservation instead of reserving twice", async () => {
    const { app, market } = createTestApp();
    const request = () =>
      jsonRequest(
        "/v1/listings/lst_tech_01/reservations",
        "POST",
        { walletId: "wallet-a" },
        { "Idempotency-Key": "buy-1:reserve" },
      );

    const first = await app.request(request());
    const second = await app.request(request());

    expect(first.headers.get("X-Idempotent-Replay")).toBeNull();
    expect(second.status).toBe(201);
    expect(second.headers.get("X-Idempotent-Replay")).toBe("true");
    expect(await readData(second)).toEqual(await readData(first));
    expect(market.getReservation("rsv_2")).toBeUndefined();
  });

  it("does not store refusals", async () => {
    const { app } = createTestApp();
    const request = (listingId: string) =>
      jsonRequest(
        `/v1/listings/${listingId}/reservations`,
        "POST",
        { walletId: "wallet-a" },
        { "Idempotency-Key": "buy-2:reserve" },
      );

    const refused = await app.request(request("lst_missing"));
    expect(refused.status).toBe(404);

    const accepted = await app.request(request("lst_tech_01"));
    expect(accepted.status).toBe(201);
    expect(accepted.headers.get("X-Idempotent-Replay")).toBeNull();
  });

  it("ignores POST without a key", async () => {
    const { app } = createTestApp();
    const body = { walletId: "wallet-a", amount: 100 };

    await app.request(jsonRequest("/v1/deposits", "POST", body));
    const second = await app.request(jsonRequest("/v1/deposits", "POST", body));

    expect(await readData(second)).toEqual({ depositId: "dep_2", status: "confirmed" });
  });

  it("refuses a key reused with a different body", async () => {
    const { app, market } = createTestApp();
    const request = (amount: number) =>
      jsonRequest(
        "/v1/deposits",
        "POST",
        { walletId: "wallet-a", amount },
        { "Idempotency-Key": "dep-key" },
      );

    await app.request(request(100));
    const res = await app.request(request(200));

    expect(res.status).toBe(422);
    expect(await res.json()).toMatchObject({
      error: {
        code: "IDEMPOTENCY_KEY_REUSED",
        message: "Idempotency-Key dep-key was already used for a different request",
      },
    });
    expect(market.getDeposit("dep_1").amount).toBe(100);
  });

  it("scopes keys to the route", async () => {
    const { app } = createTestApp();
    const headers = { "Idempotency-Key": "shared" };
    await app.request(
      jsonRequest("/v1/deposits", "POST", { walletId: "wallet-a", amount: 100 }, headers),
    );
    const payout = await app.request(
      jsonRequest(
        "/v1/payouts",
        "POST",
        { walletId: "wallet-a", amount: 100, destination: "acct-test" },
        headers,
      ),
    );

    expect(payout.headers.get("X-Idempotent-Replay")).toBeNull();
    expect(await readData(payout)).toEqual({ payoutId: "po_1", status: "completed" });
  });

  it("does not cache GET requests", async () => {
    const { app } = createTestApp();
    const headers = { "Idempotency-Key": "get-key" };
    await app.request(jsonRequest("/v1/listings", "GET", undefined, headers));
    const res = await app.request(jsonRequest("/v1/listings", "GET", undefined, headers));
    expect(res.headers.get("X-Idempotent-Replay")).toBeNull();
  });

  it("forgets entries after the TTL", async () => {
    const { app, clock } = createTestApp({ idempotencyTtlMs: 1000 });
    const request = () =>
      jsonRequest(
        "/v1/deposits",
        "POST",
        { walletId: "wallet-a", amount: 100 },
        { "Idempotency-Key": "dep-key" },
      );

    await app.request(request());
    clock.advance(1001);
    const res = await app.request(request());

    expect(res.headers.get("X-Idempotent-Replay")).toBeNull();
    expect(await readData(res)).toEqual({ depositId: "dep_2", status: "confirmed" });
  });
});

describe("InMemoryIdempotencyStore", () => {
  const entry = (storedAt: number) => ({
    fingerprint: "f",
    status: 201,
    body: "{}",
    contentType: "application/json",
    storedAt,
  });

  it("expires entries after the TTL", () => {
    let now = 0;
    const store = new InMemoryIdempotencyStore(10, () => now);
    store.remember("k", entry(0));

    expect(store.size).toBe(1);
    expect(store.lookup("k")?.status).toBe(201);

    now = 11;
    expect(store.lookup("k")).toBeUndefined();
    expect(store.size).toBe(0);
  });

  it("sweeps expired entries when storing a new one", () => {
    let now = 0;
    const store = new InMemoryIdempotencyStore(10, () => now);
    store.remember("a", entry(0));
    now = 5;
    store.remember("b", entry(5));

    now = 12;
    store.remember("c", entry(12));

    expect(store.size).toBe(2);
    expect(store.lookup("b")?.storedAt).toBe(5);
  });

  it("clears every entry", () => {
    const store = new InMemoryIdempotencyStore();
    store.remember("a", entry(0));
    store.remember("b", entry(0));
    store.clear();
    expect(store.size).toBe(0);
  });
});
