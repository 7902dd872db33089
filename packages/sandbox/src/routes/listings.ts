/**
 * Listing and reservation routes.
 *
 * GET  /v1/listings                        — Search available listings
 * POST /v1/listings                        — Create a listing
 * POST /v1/listings/:id/reservations       — Reserve a listing
 * POST /v1/reservations/:id/confirm        — Confirm a reservation
 * POST /v1/reservations/:id/cancel         — Cancel a reservation
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { CreateListingSchema, ListingQuerySchema, WalletRefSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";
import type { ReservationState } from "../services/market.js";

function reservationView(reservation: ReservationState) {
  return {
    reservationId: reservation.reservationId,
    listingId: reservation.listingId,
    price: reservation.price,
    expiresAt: reservation.expiresAt.toISOString(),
  };
}

export function createListingRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/listings", (c) => {
    const query = ListingQuerySchema.safeParse(c.req.query());
    if (!query.success) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters"), 400);
    }
    const listings = c.get("market").searchListings({
      drMin: query.data.dr_min,
      priceMax: query.data.price_max,
      topic: query.data.topic,
    });
    return c.json({ data: listings });
  });

  routes.post("/listings", validateBody(CreateListingSchema), (c) => {
    const listing = c.get("market").createListing(c.req.valid("json"));
    return c.json({ data: listing }, 201);
  });

  routes.post("/listings/:id/reservations", validateBody(WalletRefSchema), (c) => {
    const { walletId } = c.req.valid("json");
    const reservation = c.get("market").reserve(c.req.param("id"), walletId);
    return c.json({ data: reservationView(reservation) }, 201);
  });

  routes.post("/reservations/:id/confirm", validateBody(WalletRefSchema), (c) => {
    const { walletId } = c.req.valid("json");
    const reservation = c.get("market").confirm(c.req.param("id"), walletId);
    return c.json({
      data: {
        reservationId: reservation.reservationId,
        orderId: reservation.orderId,
        status: "confirmed",
      },
    });
  });

  routes.post("/reservations/:id/cancel", validateBody(WalletRefSchema), (c) => {
    const { walletId } = c.req.valid("json");
    const reservation = c.get("market").cancel(c.req.param("id"), walletId);
    return c.json({ data: { reservationId: reservation.reservationId, status: "cancelled" } });
  });

  return routes;
}
