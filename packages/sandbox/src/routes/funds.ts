/**
 * Deposit and payout routes.
 *
 * POST /v1/deposits       — Start a deposit
 * GET  /v1/deposits/:id   — Deposit status
 * POST /v1/payouts        — Request a payout
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { CreateDepositSchema, CreatePayoutSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import type { DepositState } from "../services/market.js";

function depositView(deposit: DepositState) {
  return deposit.checkoutUrl === undefined
    ? { depositId: deposit.depositId, status: deposit.status }
    : { depositId: deposit.depositId, status: deposit.status, checkoutUrl: deposit.checkoutUrl };
}

export function createFundsRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/deposits", validateBody(CreateDepositSchema), (c) => {
    const { walletId, amount } = c.req.valid("json");
    const deposit = c.get("market").initiateDeposit(walletId, amount);
    return c.json({ data: depositView(deposit) }, 201);
  });

  routes.get("/deposits/:id", (c) => {
    const deposit = c.get("market").getDeposit(c.req.param("id"));
    return c.json({ data: depositView(deposit) });
  });

  routes.post("/payouts", validateBody(CreatePayoutSchema), (c) => {
    const { walletId, amount, destination } = c.req.valid("json");
    const payout = c.get("market").requestPayout(walletId, amount, destination);
    return c.json({ data: { payoutId: payout.payoutId, status: payout.status } }, 201);
  });

  return routes;
}
