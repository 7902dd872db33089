/**
 * Seed listings the sandbox starts with.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import type { Listing } from "@linkvault/types";

const SeedListingSchema = z.object({
  listingId: z.string().min(1),
  sourceUrl: z.string().min(1),
  targetUrl: z.string(),
  price: z.number().int().positive(),
  domainRating: z.number().min(0).max(100),
  topic: z.string().min(1),
  sellerReference: z.string().min(1),
});

const SEED_FILE = new URL("../data/seed-listings.json", import.meta.url);

export function loadSeedListings(file: URL = SEED_FILE): readonly Listing[] {
  const raw: unknown = JSON.parse(readFileSync(file, "utf-8"));
  return z.array(SeedListingSchema).parse(raw);
}
