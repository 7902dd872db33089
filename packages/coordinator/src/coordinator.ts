/**
 * @linkvault/coordinator — Marketplace Transaction Coordinator.
 *
 * Drives deposit, withdraw, buy and sell against the remote marketplace
 * while the wallet file stays the single source of truth for money.
 *
 * Protocol rules:
 * - A record is persisted before the first remote call
 * - Network calls never happen while the wallet lock is held
 * - Every local commit re-checks that the record is still in the state
 *   the step was planned from; otherwise the step is re-planned
 * - `postedAtVersion` proves funds already moved, so a resumed protocol
 *   never debits twice
 * - Debited funds are only returned on a definitive remote refusal,
 *   never because of the local clock
 */

import pino from "pino";
import type { Logger } from "pino";
import type {
  LedgerBody,
  Listing,
  TransactionKind,
  TransactionPatch,
  TransactionRecord,
  Wallet,
} from "@linkvault/types";
import {
  ConflictError,
  InsufficientFundsError,
  InvalidTransitionError,
  LinkVaultError,
  RemoteRejectionError,
  SchemaError,
  ValidationError,
  errorFromFailure,
  recordedFailure,
} from "@linkvault/types";
import type { SettlingError } from "@linkvault/types";
import type { WalletStore } from "@linkvault/wallet-store";
import type {
  Deposit,
  MarketplaceGateway,
  Payout,
  Reservation,
  RetryConfig,
  SleepFn,
} from "@linkvault/client";
import { retrying } from "@linkvault/client";
import {
  IdempotencyLedger,
  advanceRecord,
  assertPositiveAmount,
  findRecord,
  isTerminal,
  patchRecord,
} from "@linkvault/ledger";
import type { RecordFilter } from "@linkvault/ledger";
import type {
  BalanceView,
  BuyRequest,
  CoordinatorOptions,
  DepositRequest,
  OperationRequest,
  OperationResult,
  ReconcileEntry,
  ReconcileReport,
  SellRequest,
  WalletContext,
  WithdrawRequest,
} from "./types.js";

// =============================================================================
// Internals
// =============================================================================

const DEFAULT_CONFLICT_RETRY: RetryConfig = {
  maxAttempts: 5,
  baseDelayMs: 25,
  maxDelayMs: 1000,
  jitterMs: 25,
};

/** HTTP statuses that settle a remote step as refused. */
const REFUSAL_STATUSES: ReadonlySet<number> = new Set([400, 403, 404, 409, 410, 422]);

/** Upper bound on planning rounds for one protocol run. */
const MAX_STEPS = 8;

/** "continue": re-plan from the stored record. "wait": the remote side is still open. */
type StepOutcome = "continue" | "wait";

interface Intent {
  readonly kind: TransactionKind;
  readonly amount: number;
  /** Defaults to the wallet id */
  readonly counterpartyReference?: string | undefined;
  readonly details?: Readonly<Record<string, string>> | undefined;
}

/** The stored record moved since the step was planned. */
class RecordMovedError extends Error {
  constructor(idempotencyKey: string) {
    super(`Transaction '${idempotencyKey}' changed while a step was in flight`);
    this.name = "RecordMovedError";
  }
}

function isDefinitiveRefusal(err: unknown): err is RemoteRejectionError {
  return (
    err instanceof RemoteRejectionError &&
    err.remoteCode !== "INVALID_RESPONSE" &&
    REFUSAL_STATUSES.has(err.status)
  );
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function sortedEntries(details: Readonly<Record<string, string>> | undefined): string {
  const entries = Object.entries(details ?? {}).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return JSON.stringify(entries);
}

function sameRequest(record: TransactionRecord, intent: Intent, walletId: string): boolean {
  return (
    record.kind === intent.kind &&
    record.counterpartyReference === (intent.counterpartyReference ?? walletId) &&
    (intent.kind === "buy" || record.amount === intent.amount) &&
    sortedEntries(record.details) === sortedEntries(intent.details)
  );
}

/** The error a failed or rolled_back record was settled with, if it was kept. */
function settledError(record: TransactionRecord): SettlingError | undefined {
  if ((record.status !== "failed" && record.status !== "rolled_back") || record.failure === undefined) {
    return undefined;
  }
  return errorFromFailure(record.failure, record.failureReason ?? "Transaction was refused");
}

function intentOf(request: OperationRequest): Intent {
  switch (request.kind) {
    case "deposit":
      assertPositiveAmount(request.amount);
      return { kind: "deposit", amount: request.amount };

    case "withdraw":
      assertPositiveAmount(request.amount);
      requireText(request.destination, "destination");
      return { kind: "withdraw", amount: request.amount, counterpartyReference: request.destination };

    // amount stays 0 until the reservation reports the price
    case "buy":
      requireText(request.listingId, "listingId");
      return { kind: "buy", amount: 0, counterpartyReference: request.listingId };

    case "sell":
      assertPositiveAmount(request.price, "price");
      requireText(request.sourceUrl, "sourceUrl");
      requireText(request.targetUrl, "targetUrl");
      requireText(request.anchor, "anchor");
      return {
        kind: "sell",
        amount: request.price,
        counterpartyReference: request.sourceUrl,
        details: {
          targetUrl: request.targetUrl,
          anchor: request.anchor,
          ...(request.topic !== undefined ? { topic: request.topic } : {}),
        },
      };
  }
}

function requireRecord(
  transactions: readonly TransactionRecord[],
  idempotencyKey: string,
): TransactionRecord {
  const record = findRecord(transactions, idempotencyKey);
  if (record === undefined) {
    throw new SchemaError(`Transaction '${idempotencyKey}' is missing from the wallet`);
  }
  return record;
}

function requireText(value: string, field: string): void {
  if (value.trim() === "") {
    throw new ValidationError(`${field} must not be empty`, field);
  }
}

// =============================================================================
// Coordinator
// =============================================================================

export class TransactionCoordinator {
  private readonly store: WalletStore;
  private readonly gateway: MarketplaceGateway;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly conflictRetry: RetryConfig;
  private readonly sleepFn: SleepFn | undefined;

  constructor(options: CoordinatorOptions) {
    this.store = options.store;
    this.gateway = options.gateway;
    this.logger = options.logger ?? pino({ level: "silent" });
    this.now = options.now ?? (() => new Date());
    this.conflictRetry = { ...DEFAULT_CONFLICT_RETRY, ...options.conflictRetry };
    this.sleepFn = options.sleepFn;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Operations
  // ───────────────────────────────────────────────────────────────────────

  async deposit(request: DepositRequest): Promise<OperationResult> {
    return this.execute(
      request,
      request.idempotencyKey,
      intentOf({ kind: "deposit", amount: request.amount }),
    );
  }

  async withdraw(request: WithdrawRequest): Promise<OperationResult> {
    return this.execute(
      request,
      request.idempotencyKey,
      intentOf({ kind: "withdraw", amount: request.amount, destination: request.destination }),
    );
  }

  /** Reserve, debit and confirm a listing purchase. */
  async buy(request: BuyRequest): Promise<OperationResult> {
    return this.execute(
      request,
      request.idempotencyKey,
      intentOf({ kind: "buy", listingId: request.listingId }),
    );
  }

  /** Create a listing. No local funds move. */
  async sell(request: SellRequest): Promise<OperationResult> {
    return this.execute(
      request,
      request.idempotencyKey,
      intentOf({
        kind: "sell",
        sourceUrl: request.sourceUrl,
        targetUrl: request.targetUrl,
        price: request.price,
        anchor: request.anchor,
        topic: request.topic,
      }),
    );
  }

  /**
   * Key of the newest open record left behind by an identical request.
   * Callers that make up keys use it so a re-run resumes that record
   * instead of starting a second operation.
   */
  resumableKey(context: WalletContext, request: OperationRequest): string | undefined {
    const intent = intentOf(request);
    const wallet = this.store.load(context.walletPath, context.passphrase);
    const open = wallet.transactions.filter(
      (t) => !isTerminal(t.status) && sameRequest(t, intent, wallet.walletId),
    );
    return open[open.length - 1]?.idempotencyKey;
  }

  /**
   * Resume every pending or reserved record. Safe to run repeatedly.
   */
  async reconcile(context: WalletContext): Promise<ReconcileReport> {
    const ledger = this.ledgerFor(context);
    const open = ledger.list({ status: ["pending", "reserved"] });
    const resolved: ReconcileEntry[] = [];
    const unresolved: ReconcileEntry[] = [];

    for (const record of open) {
      let reason: string | undefined;
      try {
        await this.drive(context, record.idempotencyKey);
      } catch (err: unknown) {
        if (err instanceof InvalidTransitionError || !(err instanceof LinkVaultError)) {
          throw err;
        }
        reason = err.message;
      }

      const after = ledger.lookup(record.idempotencyKey) ?? record;
      const entry: ReconcileEntry = {
        idempotencyKey: after.idempotencyKey,
        kind: after.kind,
        status: after.status,
        reason: reason ?? (isTerminal(after.status) ? undefined : this.waitingReason(after)),
      };
      (isTerminal(after.status) ? resolved : unresolved).push(entry);
    }

    this.logger.info(
      { examined: open.length, resolved: resolved.length, unresolved: unresolved.length },
      "reconciliation finished",
    );
    return { examined: open.length, resolved, unresolved };
  }

  balance(context: WalletContext): BalanceView {
    const wallet = this.store.load(context.walletPath, context.passphrase);
    return {
      walletId: wallet.walletId,
      name: wallet.name,
      balance: wallet.balance,
      version: wallet.version,
      updatedAt: wallet.updatedAt,
      openRecords: wallet.transactions.filter((t) => !isTerminal(t.status)).length,
    };
  }

  history(context: WalletContext, filter: RecordFilter = {}): readonly TransactionRecord[] {
    return this.ledgerFor(context).list(filter);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Protocol driver
  // ───────────────────────────────────────────────────────────────────────

  private async execute(
    context: WalletContext,
    idempotencyKey: string,
    intent: Intent,
  ): Promise<OperationResult> {
    const record = await this.begin(context, idempotencyKey, intent);
    if (isTerminal(record.status)) {
      this.logger.info({ idempotencyKey, status: record.status }, "replaying settled transaction");
      const failure = settledError(record);
      if (failure !== undefined) {
        throw failure;
      }
      return this.result(context, idempotencyKey, true);
    }

    await this.drive(context, idempotencyKey);
    const result = this.result(context, idempotencyKey, false);
    const failure = settledError(result.record);
    if (failure !== undefined) {
      throw failure;
    }
    return result;
  }

  /**
   * Find or persist the record for this key, refusing reuse for a
   * different request.
   */
  private async begin(
    context: WalletContext,
    idempotencyKey: string,
    intent: Intent,
  ): Promise<TransactionRecord> {
    requireText(idempotencyKey, "idempotencyKey");
    const wallet = this.store.load(context.walletPath, context.passphrase);

    const existing = findRecord(wallet.transactions, idempotencyKey);
    const record =
      existing ??
      (await this.withConflictRetry(() =>
        this.ledgerFor(context).recordPending(
          idempotencyKey,
          intent.kind,
          intent.amount,
          intent.counterpartyReference ?? wallet.walletId,
          intent.details,
        ),
      ));

    if (!sameRequest(record, intent, wallet.walletId)) {
      throw new ValidationError(
        `Idempotency key '${idempotencyKey}' was already used for a different ${record.kind} request`,
        "idempotencyKey",
      );
    }

    if (existing === undefined) {
      this.logger.debug({ idempotencyKey, kind: intent.kind }, "transaction recorded");
    }
    return record;
  }

  /**
   * Run protocol steps until the record is terminal or waits on the
   * marketplace.
   */
  private async drive(context: WalletContext, idempotencyKey: string): Promise<void> {
    for (let round = 0; round < MAX_STEPS; round++) {
      const wallet = this.store.load(context.walletPath, context.passphrase);
      const record = requireRecord(wallet.transactions, idempotencyKey);
      if (isTerminal(record.status)) {
        return;
      }

      let outcome: StepOutcome;
      try {
        outcome = await this.step(context, wallet, record);
      } catch (err: unknown) {
        if (err instanceof RecordMovedError) {
          this.logger.debug({ idempotencyKey }, err.message);
          continue;
        }
        throw err;
      }
      if (outcome === "wait") {
        return;
      }
    }
    throw new ConflictError(
      `Transaction '${idempotencyKey}' kept changing under concurrent writers; left for the next reconcile`,
    );
  }

  private async step(
    context: WalletContext,
    wallet: Wallet,
    record: TransactionRecord,
  ): Promise<StepOutcome> {
    this.logger.debug(
      { idempotencyKey: record.idempotencyKey, kind: record.kind, status: record.status },
      "protocol step",
    );
    switch (record.kind) {
      case "deposit":
        return this.depositStep(context, wallet, record);
      case "withdraw":
        return this.withdrawStep(context, wallet, record);
      case "buy":
        return this.buyStep(context, wallet, record);
      case "sell":
        return this.sellStep(context, wallet, record);
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Steps
  // ───────────────────────────────────────────────────────────────────────

  private async depositStep(
    context: WalletContext,
    wallet: Wallet,
    record: TransactionRecord,
  ): Promise<StepOutcome> {
    const key = record.idempotencyKey;
    let deposit: Deposit;
    try {
      deposit =
        record.remoteReference === undefined
          ? await this.gateway.initiateDeposit(wallet.walletId, record.amount, key)
          : await this.gateway.getDeposit(record.remoteReference);
    } catch (err: unknown) {
      if (isDefinitiveRefusal(err)) {
        await this.fail(context, record, err);
      }
      throw err;
    }

    switch (deposit.status) {
      case "confirmed":
        await this.applyStep(context, record, (body, w, current) => ({
          balance: body.balance + current.amount,
          transactions: advanceRecord(body.transactions, key, "confirmed", this.timestamp(), {
            remoteReference: deposit.depositId,
            postedAtVersion: w.version + 1,
          }),
        }));
        this.logger.info({ idempotencyKey: key, amount: record.amount }, "deposit credited");
        return "continue";

      case "pending":
        await this.recordStep(context, record, (transactions) =>
          patchRecord(transactions, key, {
            remoteReference: deposit.depositId,
            checkoutUrl: deposit.checkoutUrl,
          }),
        );
        return "wait";

      case "failed": {
        const declined = new RemoteRejectionError(
          "DEPOSIT_DECLINED",
          `Deposit ${deposit.depositId} was declined by the payment processor`,
          200,
        );
        await this.fail(context, record, declined, { remoteReference: deposit.depositId });
        throw declined;
      }
    }
  }

  private async withdrawStep(
    context: WalletContext,
    wallet: Wallet,
    record: TransactionRecord,
  ): Promise<StepOutcome> {
    const key = record.idempotencyKey;

    if (record.postedAtVersion === undefined) {
      try {
        await this.applyStep(context, record, (body, w, current) => {
          if (body.balance < current.amount) {
            throw new InsufficientFundsError(body.balance, current.amount);
          }
          return {
            balance: body.balance - current.amount,
            transactions: patchRecord(body.transactions, key, { postedAtVersion: w.version + 1 }),
          };
        });
      } catch (err: unknown) {
        if (err instanceof InsufficientFundsError) {
          await this.fail(context, record, err);
        }
        throw err;
      }
      return "continue";
    }

    let payout: Payout;
    try {
      payout = await this.gateway.requestPayout(
        wallet.walletId,
        record.amount,
        record.counterpartyReference,
        key,
      );
    } catch (err: unknown) {
      if (isDefinitiveRefusal(err)) {
        await this.reverse(context, record, err);
      } else if (record.status === "pending") {
        await this.recordStep(context, record, (transactions) =>
          advanceRecord(transactions, key, "reserved", this.timestamp(), {
            failureReason: errorMessage(err),
          }),
        );
      }
      throw err;
    }

    switch (payout.status) {
      case "completed":
        await this.recordStep(context, record, (transactions) =>
          advanceRecord(transactions, key, "confirmed", this.timestamp(), {
            remoteReference: payout.payoutId,
          }),
        );
        this.logger.info({ idempotencyKey: key, amount: record.amount }, "payout completed");
        return "continue";

      case "processing":
        await this.recordStep(context, record, (transactions) =>
          record.status === "pending"
            ? advanceRecord(transactions, key, "reserved", this.timestamp(), {
                remoteReference: payout.payoutId,
              })
            : patchRecord(transactions, key, { remoteReference: payout.payoutId }),
        );
        return "wait";

      case "failed": {
        const rejected = new RemoteRejectionError(
          "PAYOUT_FAILED",
          `Payout ${payout.payoutId} was rejected`,
          200,
        );
        await this.reverse(context, record, rejected, { remoteReference: payout.payoutId });
        throw rejected;
      }
    }
  }

  private async buyStep(
    context: WalletContext,
    wallet: Wallet,
    record: TransactionRecord,
  ): Promise<StepOutcome> {
    const key = record.idempotencyKey;

    if (record.status === "pending") {
      let reservation: Reservation;
      try {
        reservation = await this.gateway.reserveListing(
          record.counterpartyReference,
          wallet.walletId,
          key,
        );
      } catch (err: unknown) {
        if (isDefinitiveRefusal(err)) {
          await this.fail(context, record, err);
        }
        throw err;
      }
      await this.recordStep(context, record, (transactions) =>
        advanceRecord(transactions, key, "reserved", this.timestamp(), {
          amount: reservation.price,
          remoteReference: reservation.reservationId,
          reservationExpiresAt: reservation.expiresAt,
        }),
      );
      return "continue";
    }

    const reservationId = record.remoteReference;
    if (reservationId === undefined) {
      throw new SchemaError(`Reserved purchase '${key}' has no reservation reference`);
    }

    if (record.postedAtVersion === undefined) {
      try {
        await this.applyStep(context, record, (body, w, current) => {
          if (body.balance < current.amount) {
            throw new InsufficientFundsError(body.balance, current.amount);
          }
          return {
            balance: body.balance - current.amount,
            transactions: patchRecord(body.transactions, key, { postedAtVersion: w.version + 1 }),
          };
        });
      } catch (err: unknown) {
        if (err instanceof InsufficientFundsError) {
          const shortfall = { failureReason: err.message, failure: recordedFailure(err) };
          await this.releaseReservation(reservationId, wallet.walletId, key);
          await this.recordStep(context, record, (transactions) =>
            advanceRecord(transactions, key, "rolled_back", this.timestamp(), shortfall),
          );
          this.logger.info({ idempotencyKey: key }, "purchase rolled back: insufficient funds");
        }
        throw err;
      }
      return "continue";
    }

    try {
      await this.gateway.confirmPurchase(reservationId, wallet.walletId, key);
    } catch (err: unknown) {
      if (isDefinitiveRefusal(err)) {
        await this.reverse(context, record, err);
        this.logger.warn({ idempotencyKey: key, code: err.remoteCode }, "purchase refused, funds returned");
      }
      throw err;
    }

    await this.recordStep(context, record, (transactions) =>
      advanceRecord(transactions, key, "confirmed", this.timestamp()),
    );
    this.logger.info({ idempotencyKey: key, amount: record.amount }, "purchase confirmed");
    return "continue";
  }

  private async sellStep(
    context: WalletContext,
    wallet: Wallet,
    record: TransactionRecord,
  ): Promise<StepOutcome> {
    const key = record.idempotencyKey;
    const targetUrl = record.details?.["targetUrl"];
    const anchor = record.details?.["anchor"];
    const topic = record.details?.["topic"];
    if (targetUrl === undefined || anchor === undefined) {
      throw new SchemaError(`Listing request '${key}' is missing its target or anchor`);
    }

    let listing: Listing;
    try {
      listing = await this.gateway.createListing(
        {
          walletId: wallet.walletId,
          sourceUrl: record.counterpartyReference,
          targetUrl,
          price: record.amount,
          anchor,
          topic,
        },
        key,
      );
    } catch (err: unknown) {
      if (isDefinitiveRefusal(err)) {
        await this.fail(context, record, err);
      }
      throw err;
    }

    await this.recordStep(context, record, (transactions) =>
      advanceRecord(transactions, key, "confirmed", this.timestamp(), {
        remoteReference: listing.listingId,
      }),
    );
    return "continue";
  }

  // ───────────────────────────────────────────────────────────────────────
  // Local commits
  // ───────────────────────────────────────────────────────────────────────

  private async fail(
    context: WalletContext,
    record: TransactionRecord,
    err: SettlingError,
    patch: TransactionPatch = {},
  ): Promise<void> {
    await this.recordStep(context, record, (transactions) =>
      advanceRecord(transactions, record.idempotencyKey, "failed", this.timestamp(), {
        ...patch,
        failureReason: err.message,
        failure: recordedFailure(err),
      }),
    );
    this.logger.info(
      { idempotencyKey: record.idempotencyKey, reason: err.message },
      "transaction failed",
    );
  }

  /**
   * Credit back a posted debit and close the record as rolled_back.
   */
  private async reverse(
    context: WalletContext,
    record: TransactionRecord,
    err: SettlingError,
    patch: TransactionPatch = {},
  ): Promise<void> {
    const key = record.idempotencyKey;
    const reserved =
      record.status === "pending"
        ? await this.recordStep(context, record, (transactions) =>
            advanceRecord(transactions, key, "reserved", this.timestamp(), patch),
          )
        : record;

    await this.applyStep(context, reserved, (body, w, current) => ({
      balance: body.balance + current.amount,
      transactions: advanceRecord(body.transactions, key, "rolled_back", this.timestamp(), {
        ...patch,
        reversedAtVersion: w.version + 1,
        failureReason: err.message,
        failure: recordedFailure(err),
      }),
    }));
    this.logger.warn(
      { idempotencyKey: key, amount: record.amount, reason: err.message },
      "debit reversed",
    );
  }

  /** Cancel a reservation; one the marketplace already dropped counts as released. */
  private async releaseReservation(
    reservationId: string,
    walletId: string,
    idempotencyKey: string,
  ): Promise<void> {
    try {
      await this.gateway.cancelReservation(reservationId, walletId, idempotencyKey);
    } catch (err: unknown) {
      if (!isDefinitiveRefusal(err)) {
        throw err;
      }
      this.logger.debug({ reservationId, code: err.remoteCode }, "reservation already released");
    }
  }

  /**
   * Balance-changing commit, guarded against a record that moved.
   */
  private async applyStep(
    context: WalletContext,
    expected: TransactionRecord,
    mutate: (body: LedgerBody, wallet: Wallet, current: TransactionRecord) => LedgerBody,
  ): Promise<TransactionRecord> {
    const wallet = await this.withConflictRetry(() =>
      this.store.apply(context.walletPath, context.passphrase, (body, w) =>
        mutate(body, w, this.unchanged(body.transactions, expected)),
      ),
    );
    return requireRecord(wallet.transactions, expected.idempotencyKey);
  }

  /**
   * Records-only commit, guarded the same way.
   */
  private async recordStep(
    context: WalletContext,
    expected: TransactionRecord,
    mutate: (transactions: readonly TransactionRecord[]) => readonly TransactionRecord[],
  ): Promise<TransactionRecord> {
    const wallet = await this.withConflictRetry(() =>
      this.store.record(context.walletPath, context.passphrase, (transactions) => {
        this.unchanged(transactions, expected);
        return mutate(transactions);
      }),
    );
    return requireRecord(wallet.transactions, expected.idempotencyKey);
  }

  private unchanged(
    transactions: readonly TransactionRecord[],
    expected: TransactionRecord,
  ): TransactionRecord {
    const current = requireRecord(transactions, expected.idempotencyKey);
    if (
      current.status !== expected.status ||
      current.postedAtVersion !== expected.postedAtVersion
    ) {
      throw new RecordMovedError(expected.idempotencyKey);
    }
    return current;
  }

  /**
   * Restart a local commit after ConflictError with backoff.
   * Once the budget is spent the last ConflictError surfaces.
   */
  private async withConflictRetry<T>(commit: () => T): Promise<T> {
    return retrying(async () => commit(), this.conflictRetry, {
      retryable: (err) => err instanceof ConflictError,
      sleepFn: this.sleepFn,
      onRetry: ({ retry, delayMs, error }) => {
        this.logger.warn(
          { retry, delayMs: Math.round(delayMs), reason: errorMessage(error) },
          "wallet busy, retrying",
        );
      },
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Helpers
  // ───────────────────────────────────────────────────────────────────────

  private ledgerFor(context: WalletContext): IdempotencyLedger {
    return new IdempotencyLedger(this.store, context.walletPath, context.passphrase, {
      now: this.now,
    });
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  private waitingReason(record: TransactionRecord): string {
    if (record.kind === "deposit" && record.checkoutUrl !== undefined) {
      return `awaiting payment at ${record.checkoutUrl}`;
    }
    return record.failureReason ?? "awaiting the marketplace";
  }

  private result(
    context: WalletContext,
    idempotencyKey: string,
    replayed: boolean,
  ): OperationResult {
    const wallet = this.store.load(context.walletPath, context.passphrase);
    return {
      record: requireRecord(wallet.transactions, idempotencyKey),
      balance: wallet.balance,
      version: wallet.version,
      replayed,
    };
  }
}
