/**
 * @linkvault/coordinator — Wallet ledger and marketplace transaction coordination.
 */

export { TransactionCoordinator } from "./coordinator.js";

export type {
  CoordinatorOptions,
  WalletContext,
  DepositRequest,
  WithdrawRequest,
  BuyRequest,
  SellRequest,
  OperationRequest,
  OperationResult,
  BalanceView,
  ReconcileEntry,
  ReconcileReport,
} from "./types.js";
