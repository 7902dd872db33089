/**
 * Wallet commands.
 */

import { z } from "zod";
import type { ChalkInstance } from "chalk";
import type {
  OperationRequest,
  OperationResult,
  WalletContext,
} from "@linkvault/coordinator";
import { defineOperation, flag, minorUnits } from "./define.js";
import type { OperationContext, ParamSpec } from "./define.js";
import { historyTable, info, money, ok, warn } from "../format.js";
import { withIdempotencyKey } from "../errors.js";

// =============================================================================
// Shared
// =============================================================================

export const walletParam: ParamSpec = {
  name: "wallet",
  type: "string",
  description: "Path to the wallet file",
  required: true,
};

export const keyParam: ParamSpec = {
  name: "idempotencyKey",
  type: "string",
  description: "Reuse to retry the same operation without repeating its effect",
};

export const optionalKey = z.string().min(1).optional();

async function settleOpenRecords({ runtime }: OperationContext, context: WalletContext): Promise<void> {
  if (!runtime.config.LINKVAULT_AUTO_RECONCILE) {
    return;
  }
  const { openRecords } = runtime.coordinator.balance(context);
  if (openRecords > 0) {
    const report = await runtime.coordinator.reconcile(context);
    runtime.logger.info(
      { resolved: report.resolved.length, unresolved: report.unresolved.length },
      "settled open records before running the command",
    );
  }
}

/**
 * Resolve the wallet path and passphrase, settling open records first
 * when auto-reconcile is on.
 */
export async function openWallet(
  ctx: OperationContext,
  walletPath: string,
  reconcile = true,
): Promise<WalletContext> {
  const context: WalletContext = {
    walletPath: ctx.runtime.resolvePath(walletPath),
    passphrase: await ctx.runtime.passphrase(false),
  };
  if (reconcile) {
    await settleOpenRecords(ctx, context);
  }
  return context;
}

/**
 * Open the wallet for a money-moving command and choose its key.
 *
 * Without `--idempotency-key`, an open record left by the same request
 * is taken over under its own key. The lookup happens before
 * auto-reconcile can settle that record, so the command then replays it
 * rather than issuing the operation a second time.
 */
export async function openOperation(
  ctx: OperationContext,
  walletPath: string,
  request: OperationRequest,
  idempotencyKey: string | undefined,
): Promise<WalletContext & { readonly idempotencyKey: string }> {
  const { runtime } = ctx;
  const context = await openWallet(ctx, walletPath, false);
  const resumed =
    idempotencyKey === undefined ? runtime.coordinator.resumableKey(context, request) : undefined;
  if (resumed !== undefined) {
    runtime.logger.info({ idempotencyKey: resumed, kind: request.kind }, "resuming unfinished operation");
  }
  await settleOpenRecords(ctx, context);
  return { ...context, idempotencyKey: idempotencyKey ?? resumed ?? runtime.newIdempotencyKey() };
}

export function describeResult(style: ChalkInstance, verb: string, result: OperationResult): string {
  const { record } = result;
  const headline = result.replayed
    ? `${verb} already recorded: ${record.status}`
    : `${verb} ${record.status}`;
  const lines = [
    record.status === "confirmed" ? ok(style, headline) : warn(style, headline),
    info(style, "Amount", money(record.amount)),
    info(style, "Balance", money(result.balance)),
    info(style, "Version", String(result.version)),
    info(style, "Idempotency key", record.idempotencyKey),
  ];
  if (record.remoteReference !== undefined) {
    lines.push(info(style, "Reference", record.remoteReference));
  }
  if (record.status === "pending" && record.checkoutUrl !== undefined) {
    lines.push(info(style, "Checkout", record.checkoutUrl));
  }
  if (record.failureReason !== undefined) {
    lines.push(info(style, "Reason", record.failureReason));
  }
  return lines.join("\n");
}

// =============================================================================
// Commands
// =============================================================================

export const walletCreateOperation = defineOperation({
  name: "wallet_create",
  command: ["wallet", "create"],
  description: "Create an encrypted wallet file",
  params: [
    { name: "name", type: "string", description: "Wallet name", required: true },
    { name: "output", type: "string", description: "Where to write the wallet", required: true },
    { name: "force", type: "boolean", description: "Overwrite an existing wallet file" },
  ],
  input: z.object({ name: z.string().min(1), output: z.string().min(1), force: flag }),
  async run(input, { runtime, style }) {
    const path = runtime.resolvePath(input.output);
    const passphrase = await runtime.passphrase(true);
    const wallet = runtime.store.create(path, input.name, passphrase, { overwrite: input.force });
    return {
      data: {
        walletId: wallet.walletId,
        name: wallet.name,
        path,
        balance: wallet.balance,
        version: wallet.version,
      },
      text: [
        ok(style, `Created wallet ${wallet.name}`),
        info(style, "Wallet ID", wallet.walletId),
        info(style, "File", path),
      ].join("\n"),
    };
  },
});

export const walletBalanceOperation = defineOperation({
  name: "wallet_balance",
  command: ["wallet", "balance"],
  description: "Show the wallet balance",
  params: [walletParam],
  input: z.object({ wallet: z.string().min(1) }),
  async run(input, ctx) {
    const view = ctx.runtime.coordinator.balance(await openWallet(ctx, input.wallet));
    const { style } = ctx;
    const lines = [
      info(style, "Wallet", `${view.name} (${view.walletId})`),
      info(style, "Balance", style.bold(money(view.balance))),
      info(style, "Version", String(view.version)),
      info(style, "Updated", view.updatedAt),
    ];
    if (view.openRecords > 0) {
      lines.push(warn(style, `${view.openRecords} transaction(s) still open`));
    }
    return { data: view, text: lines.join("\n") };
  },
});

export const walletDepositOperation = defineOperation({
  name: "wallet_deposit",
  command: ["wallet", "deposit"],
  description: "Add funds to the wallet",
  params: [
    walletParam,
    { name: "amount", type: "integer", description: "Amount in minor units", required: true },
    keyParam,
  ],
  input: z.object({
    wallet: z.string().min(1),
    amount: minorUnits("amount"),
    idempotencyKey: optionalKey,
  }),
  async run(input, ctx) {
    const request = { kind: "deposit", amount: input.amount } as const;
    const opened = await openOperation(ctx, input.wallet, request, input.idempotencyKey);
    const result = await withIdempotencyKey(opened.idempotencyKey, () =>
      ctx.runtime.coordinator.deposit({ ...opened, amount: input.amount }),
    );
    return { data: result, text: describeResult(ctx.style, "Deposit", result) };
  },
});

export const walletWithdrawOperation = defineOperation({
  name: "wallet_withdraw",
  command: ["wallet", "withdraw"],
  description: "Pay funds out of the wallet",
  params: [
    walletParam,
    { name: "amount", type: "integer", description: "Amount in minor units", required: true },
    { name: "dest", type: "string", description: "Payout destination account", required: true },
    keyParam,
  ],
  input: z.object({
    wallet: z.string().min(1),
    amount: minorUnits("amount"),
    dest: z.string().min(1),
    idempotencyKey: optionalKey,
  }),
  async run(input, ctx) {
    const request = { kind: "withdraw", amount: input.amount, destination: input.dest } as const;
    const opened = await openOperation(ctx, input.wallet, request, input.idempotencyKey);
    const result = await withIdempotencyKey(opened.idempotencyKey, () =>
      ctx.runtime.coordinator.withdraw({ ...opened, amount: input.amount, destination: input.dest }),
    );
    return { data: result, text: describeResult(ctx.style, "Withdrawal", result) };
  },
});

export const walletHistoryOperation = defineOperation({
  name: "wallet_history",
  command: ["wallet", "history"],
  description: "List the wallet's transactions",
  params: [walletParam],
  input: z.object({ wallet: z.string().min(1) }),
  async run(input, ctx) {
    const records = ctx.runtime.coordinator.history(await openWallet(ctx, input.wallet));
    return {
      data: records,
      text: records.length === 0 ? "No transactions yet." : historyTable(ctx.style, records),
    };
  },
});

export const walletReconcileOperation = defineOperation({
  name: "wallet_reconcile",
  command: ["wallet", "reconcile"],
  description: "Resume unfinished transactions",
  params: [walletParam],
  input: z.object({ wallet: z.string().min(1) }),
  async run(input, ctx) {
    const report = await ctx.runtime.coordinator.reconcile(
      await openWallet(ctx, input.wallet, false),
    );
    const { style } = ctx;
    const lines = [ok(style, `Examined ${report.examined} open transaction(s)`)];
    for (const entry of report.resolved) {
      lines.push(info(style, entry.idempotencyKey, `${entry.kind} ${entry.status}`));
    }
    for (const entry of report.unresolved) {
      lines.push(warn(style, `${entry.idempotencyKey}: ${entry.kind} ${entry.status} (${entry.reason ?? "waiting"})`));
    }
    return { data: report, text: lines.join("\n") };
  },
});
