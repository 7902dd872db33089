/**
 * @linkvault/sandbox — In-memory marketplace.
 */

export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { SandboxConfig } from "./config.js";
export { SandboxMarket, DEFAULT_RESERVATION_TTL_MS } from "./services/market.js";
export type {
  SandboxMarketOptions,
  ReservationState,
  DepositState,
  PayoutState,
  DomainMetrics,
  SpamReport,
  NewListing,
} from "./services/market.js";
export { loadSeedListings } from "./services/seed.js";
export { MarketError, createErrorEnvelope } from "./types/error.js";
export type { ApiErrorCode, ErrorEnvelope, ErrorStatus } from "./types/error.js";
export type { RequestLogEntry } from "./middleware/logger.js";
