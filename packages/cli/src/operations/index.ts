import type { Operation } from "./define.js";
import {
  initOperation,
  lookupOperation,
  spamScoreOperation,
  toolspecOperation,
  validateOperation,
} from "./tools.js";
import {
  walletBalanceOperation,
  walletCreateOperation,
  walletDepositOperation,
  walletHistoryOperation,
  walletReconcileOperation,
  walletWithdrawOperation,
} from "./wallet.js";
import { marketBuyOperation, marketListOperation, marketSellOperation } from "./market.js";

/** Every command, in help order. */
export const OPERATIONS: readonly Operation[] = [
  initOperation,
  validateOperation,
  lookupOperation,
  spamScoreOperation,
  walletCreateOperation,
  walletBalanceOperation,
  walletDepositOperation,
  walletWithdrawOperation,
  walletHistoryOperation,
  walletReconcileOperation,
  marketListOperation,
  marketBuyOperation,
  marketSellOperation,
  toolspecOperation,
];

export { defineOperation } from "./define.js";
export type {
  Operation,
  OperationContext,
  OperationSpec,
  ParamSpec,
  ParamType,
  CommandOutput,
} from "./define.js";
