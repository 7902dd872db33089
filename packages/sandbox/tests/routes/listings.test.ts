import { describe, it, expect } from "vitest";
import { createTestApp, jsonRequest, readData, readList } from "../setup.js";

describe("GET /v1/listings", () => {
  it("returns the available listings filtered by query", async () => {
    const { app } = createTestApp();
    const res = await app.request(jsonRequest("/v1/listings?dr_min=50&topic=technology"));

    expect(res.status).toBe(200);
    const listings = await readList(res);
    expect(listings.map((l) => l["listingId"])).toEqual(["lst_tech_01", "lst_tech_02"]);
  });

  it("applies price_max", async () => {
    const { app } = createTestApp();
    const res = await app.request(jsonRequest("/v1/listings?price_max=3000"));
    const listings = await readList(res);
    expect(listings.map((l) => l["listingId"])).toEqual(["lst_garden_02", "lst_food_01"]);
  });

  it("rejects a non-numeric filter", async () => {
    const { app } = createTestApp();
    const res = await app.request(jsonRequest("/v1/listings?dr_min=high"));
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { code: "VALIDATION_ERROR", message: "Invalid query parameters" },
    });
  });
});

describe("POST /v1/listings", () => {
  it("creates a listing", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/v1/listings", "POST", {
        walletId: "wallet-a",
        sourceUrl: "https://mysite.example/post",
        targetUrl: "https://target.example/",
        price: 1500,
        anchor: "click here",
        topic: "technology",
      }),
    );

    expect(res.status).toBe(201);
    expect(await readData(res)).toMatchObject({
      listingId: "lst_1",
      price: 1500,
      anchor: "click here",
      topic: "technology",
      sellerReference: "seller_wallet-a",
    });
  });

  it("validates the body", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/v1/listings", "POST", {
        walletId: "wallet-a",
        sourceUrl: "https://mysite.example/post",
        targetUrl: "https://target.example/",
        price: -5,
        anchor: "click here",
      }),
    );

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      error: {
        code: "VALIDATION_ERROR",
        message: "Request body validation failed",
        details: { issues: [{ path: "price" }] },
      },
    });
  });

  it("rejects a malformed JSON body", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      new Request("http://localhost/v1/listings", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: "{not json",
      }),
    );
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { code: "VALIDATION_ERROR" } });
  });
});

describe("reservation lifecycle", () => {
  it("reserves, confirms and replays the confirmation", async () => {
    const { app } = createTestApp();

    const reserved = await app.request(
      jsonRequest("/v1/listings/lst_travel_01/reservations", "POST", { walletId: "wallet-a" }),
    );
    expect(reserved.status).toBe(201);
    expect(await readData(reserved)).toEqual({
      reservationId: "rsv_1",
      listingId: "lst_travel_01",
      price: 6000,
      expiresAt: "2026-03-01T12:02:00.000Z",
    });

    const confirmed = await app.request(
      jsonRequest("/v1/reservations/rsv_1/confirm", "POST", { walletId: "wallet-a" }),
    );
    expect(confirmed.status).toBe(200);
    expect(await readData(confirmed)).toEqual({
      reservationId: "rsv_1",
      orderId: "ord_1",
      status: "confirmed",
    });
  });

  it("answers 410 RESERVATION_EXPIRED once the hold lapses", async () => {
    const { app, clock } = createTestApp({ reservationTtlMs: 5000 });
    await app.request(
      jsonRequest("/v1/listings/lst_travel_01/reservations", "POST", { walletId: "wallet-a" }),
    );
    clock.advance(5000);

    const res = await app.request(
      jsonRequest("/v1/reservations/rsv_1/confirm", "POST", { walletId: "wallet-a" }),
    );
    expect(res.status).toBe(410);
    expect(await res.json()).toEqual({
      error: {
        code: "RESERVATION_EXPIRED",
        message: "Reservation rsv_1 expired at 2026-03-01T12:00:05.000Z",
      },
    });
  });

  it("cancels a reservation", async () => {
    const { app } = createTestApp();
    await app.request(
      jsonRequest("/v1/listings/lst_food_01/reservations", "POST", { walletId: "wallet-a" }),
    );

    const res = await app.request(
      jsonRequest("/v1/reservations/rsv_1/cancel", "POST", { walletId: "wallet-a" }),
    );
    expect(res.status).toBe(200);
    expect(await readData(res)).toEqual({ reservationId: "rsv_1", status: "cancelled" });
  });

  it("answers 404 for an unknown listing", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/v1/listings/lst_nope/reservations", "POST", { walletId: "wallet-a" }),
    );
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { code: "LISTING_NOT_FOUND", message: "Listing lst_nope not found" },
    });
  });
});
