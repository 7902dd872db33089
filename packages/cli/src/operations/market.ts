/**
 * Marketplace commands.
 */

import { z } from "zod";
import { defineOperation, minorUnits, numeric } from "./define.js";
import { describeResult, keyParam, openOperation, optionalKey, walletParam } from "./wallet.js";
import { listingsTable } from "../format.js";
import { withIdempotencyKey } from "../errors.js";

export const marketListOperation = defineOperation({
  name: "market_list",
  command: ["market", "list"],
  description: "Search backlink listings",
  params: [
    {
      name: "drMin",
      type: "integer",
      description: "Minimum domain rating",
      flag: "--dr-min <rating>",
    },
    {
      name: "priceMax",
      type: "integer",
      description: "Maximum price in minor units",
      flag: "--price-max <amount>",
    },
    { name: "topic", type: "string", description: "Topic to match" },
  ],
  input: z.object({
    drMin: numeric("dr-min").optional(),
    priceMax: minorUnits("price-max").optional(),
    topic: z.string().min(1).optional(),
  }),
  async run(input, { runtime, style }) {
    const listings = await runtime.gateway.searchListings({
      drMin: input.drMin,
      priceMax: input.priceMax,
      topic: input.topic,
    });
    return {
      data: listings,
      text: listings.length === 0 ? "No listings found." : listingsTable(style, listings),
    };
  },
});

export const marketBuyOperation = defineOperation({
  name: "market_buy",
  command: ["market", "buy"],
  description: "Buy a backlink listing with wallet funds",
  params: [
    walletParam,
    { name: "listingId", type: "string", description: "Listing to buy", required: true },
    keyParam,
  ],
  input: z.object({
    wallet: z.string().min(1),
    listingId: z.string().min(1),
    idempotencyKey: optionalKey,
  }),
  async run(input, ctx) {
    const request = { kind: "buy", listingId: input.listingId } as const;
    const opened = await openOperation(ctx, input.wallet, request, input.idempotencyKey);
    const result = await withIdempotencyKey(opened.idempotencyKey, () =>
      ctx.runtime.coordinator.buy({ ...opened, listingId: input.listingId }),
    );
    return { data: result, text: describeResult(ctx.style, "Purchase", result) };
  },
});

export const marketSellOperation = defineOperation({
  name: "market_sell",
  command: ["market", "sell"],
  description: "List a backlink for sale",
  params: [
    walletParam,
    { name: "sourceUrl", type: "string", description: "Page that will carry the link", required: true },
    { name: "targetUrl", type: "string", description: "Page the link points to", required: true },
    { name: "price", type: "integer", description: "Price in minor units", required: true },
    { name: "anchor", type: "string", description: "Anchor text", required: true },
    { name: "topic", type: "string", description: "Topic of the source page" },
    keyParam,
  ],
  input: z.object({
    wallet: z.string().min(1),
    sourceUrl: z.string().min(1),
    targetUrl: z.string().min(1),
    price: minorUnits("price"),
    anchor: z.string().min(1),
    topic: z.string().min(1).optional(),
    idempotencyKey: optionalKey,
  }),
  async run(input, ctx) {
    const listing = {
      sourceUrl: input.sourceUrl,
      targetUrl: input.targetUrl,
      price: input.price,
      anchor: input.anchor,
      topic: input.topic,
    };
    const opened = await openOperation(
      ctx,
      input.wallet,
      { kind: "sell", ...listing },
      input.idempotencyKey,
    );
    const result = await withIdempotencyKey(opened.idempotencyKey, () =>
      ctx.runtime.coordinator.sell({ ...opened, ...listing }),
    );
    return { data: result, text: describeResult(ctx.style, "Listing", result) };
  },
});
