/**
 * Ledger Domain Types
 */

import type {
  TransactionRecord,
  TransactionStatus,
  TransactionType,
  UserStatus,
  Wallet,
} from '@payflow/database';

/** A wallet read under lock, with its owner's account status */
export interface LockedWallet extends Wallet {
  ownerStatus: UserStatus;
}

export interface TransferQuote {
  amountMinor: number;
  feeMinor: number;
  totalMinor: number;
}

export interface TransferParams {
  senderId: string;
  receiverId: string;
  amountMinor: number;
  note?: string | null;
}

export interface TransferResult {
  transaction: TransactionRecord;
  senderWallet: Wallet;
  receiverWallet: Wallet;
}

/**
 * Row written by the ledger; ids and timestamps are assigned by the store.
 */
export interface NewLedgerEntry {
  reference: string;
  senderId: string;
  receiverId: string;
  amountMinor: number;
  feeMinor: number;
  totalMinor: number;
  type: TransactionType;
  status: TransactionStatus;
  note: string | null;
}

export interface PartySummary {
  id: string;
  firstName: string;
  lastName: string;
  email: string;
}

export interface TransactionWithParties extends TransactionRecord {
  sender: PartySummary | null;
  receiver: PartySummary | null;
}

export type TransactionDirection = 'all' | 'sent' | 'received';

export interface ListTransactionsParams {
  direction: TransactionDirection;
  limit: number;
  offset: number;
}

export interface Page<T> {
  items: T[];
  total: number;
  limit: number;
  offset: number;
}
