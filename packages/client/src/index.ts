/**
 * @linkvault/client — Remote marketplace client.
 */

export { MarketplaceClient } from "./marketplace-client.js";
export type { MarketplaceGateway, CreateListingInput } from "./gateway.js";

export { HttpClient } from "./http-client.js";
export type { HttpClientConfig, RequestOptions, ResponseSchema } from "./http-client.js";

export { retrying, backoffDelay, sleep, DEFAULT_RETRY_CONFIG } from "./retry.js";
export type { RetryConfig, RetryEvent, RetryOptions, SleepFn } from "./retry.js";

export {
  ListingSchema,
  ListingListSchema,
  ReservationSchema,
  PurchaseConfirmationSchema,
  CancellationSchema,
  DepositSchema,
  PayoutSchema,
  LookupResultSchema,
  SpamScoreSchema,
  ErrorEnvelopeSchema,
} from "./schemas.js";
export type {
  Reservation,
  PurchaseConfirmation,
  Cancellation,
  Deposit,
  Payout,
  LookupResult,
  SpamScore,
} from "./schemas.js";
