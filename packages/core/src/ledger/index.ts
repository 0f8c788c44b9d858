/**
 * Ledger Domain
 *
 * Fee policy, money conversion, the transfer executor and transaction queries
 */

export {
  DEFAULT_FEE_POLICY_CONFIG,
  computeFee,
  createFeePolicy,
  defaultFeePolicy,
  quoteTransfer,
} from './fee-policy.js';
export type { FeePolicy, FeePolicyConfig } from './fee-policy.js';

export {
  DEFAULT_CURRENCY,
  MINOR_UNITS_PER_MAJOR,
  formatMoney,
  toMajorUnits,
  toMinorUnits,
} from './money.js';

export { generateReference } from './reference.js';
export type { ReferencePrefix } from './reference.js';

export { DrizzleLedgerStore } from './ledger-store.js';
export type { LedgerStore, LedgerTransaction } from './ledger-store.js';

export { TransferService } from './transfer-service.js';

export { DrizzleTransactionRepository } from './transaction-repository.js';
export type { TransactionRepository } from './transaction-repository.js';

export { TransactionService } from './transaction-service.js';

export { presentTransaction, transactionDirection } from './transaction-presenter.js';
export type { PartyView, TransactionView } from './transaction-presenter.js';

export type {
  ListTransactionsParams,
  LockedWallet,
  NewLedgerEntry,
  Page,
  PartySummary,
  TransactionDirection,
  TransactionWithParties,
  TransferParams,
  TransferQuote,
  TransferResult,
} from './ledger-types.js';

export {
  ReceiverNotFoundError,
  TransactionAccessDeniedError,
  TransactionNotFoundError,
  WalletInactiveError,
  WalletNotFoundError,
} from './ledger-errors.js';
