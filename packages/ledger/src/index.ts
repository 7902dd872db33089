/**
 * @linkvault/ledger — Idempotency Ledger and minor-unit money helpers.
 */

export { IdempotencyLedger } from "./idempotency-ledger.js";
export type { IdempotencyLedgerOptions, RecordFilter } from "./idempotency-ledger.js";

export {
  appendPending,
  advanceRecord,
  patchRecord,
  findRecord,
} from "./records.js";
export type { PendingRecordInput } from "./records.js";

export {
  VALID_TRANSITIONS,
  canTransition,
  assertTransition,
  isTerminal,
} from "./transitions.js";

export { parseMinorUnits, assertPositiveAmount, formatMinorUnits } from "./money.js";
