/**
 * Admin Domain Types
 */

import type {
  TransactionStatus,
  TransactionType,
  User,
  UserRole,
  UserStatus,
  Wallet,
  WalletStatus,
} from '@payflow/database';
import type { Page } from '../ledger/ledger-types.js';
import type { TransactionView } from '../ledger/transaction-presenter.js';
import type { UserView } from '../users/user-types.js';
import type { WalletView } from '../wallets/wallet-presenter.js';

export type StatsPeriod = 'today' | 'week' | 'month' | 'year' | 'all';

export interface AdminListUsersParams {
  search?: string;
  status?: UserStatus;
  limit: number;
  offset: number;
}

export interface AdminUserRecord {
  user: User;
  wallet: Wallet | null;
  sentCount: number;
  receivedCount: number;
}

export interface AdminUserView extends UserView {
  wallet: WalletView | null;
  sentCount: number;
  receivedCount: number;
}

export interface AdminUserDetailView extends AdminUserView {
  recentTransactions: {
    sent: TransactionView[];
    received: TransactionView[];
  };
}

export interface AdminListWalletsParams {
  /** Matches the owner's name or email, or the wallet number */
  search?: string;
  status?: WalletStatus;
  limit: number;
  offset: number;
}

export interface WalletOwnerSummary {
  id: string;
  firstName: string;
  lastName: string;
  email: string;
  status: UserStatus;
}

export interface AdminWalletRecord {
  wallet: Wallet;
  owner: WalletOwnerSummary;
  /** Completed outgoing transfers, fees included */
  sentTotalMinor: number;
  /** Completed incoming transfers; deposits excluded */
  receivedTotalMinor: number;
}

/** Platform-wide figures; unaffected by the listing filters */
export interface AdminWalletSummary {
  walletCount: number;
  activeCount: number;
  totalBalanceMinor: number;
}

export interface AdminWalletPage extends Page<AdminWalletRecord> {
  summary: AdminWalletSummary;
}

export interface AdminWalletView extends WalletView {
  owner: { id: string; name: string; email: string; status: UserStatus };
  totals: { sent: number; received: number };
}

export interface AdminWalletListView extends Page<AdminWalletView> {
  statistics: {
    totalBalance: number;
    activeWallets: number;
    averageBalance: number;
  };
}

export interface AdminListTransactionsParams {
  type?: TransactionType;
  status?: TransactionStatus;
  /** Matches the reference or either party's email */
  search?: string;
  from?: Date;
  to?: Date;
  limit: number;
  offset: number;
}

/**
 * Raw aggregates in minor units. `since` bounds the user sign-ups and
 * transaction figures; wallet totals are always current.
 */
export interface AdminStatsSnapshot {
  users: {
    total: number;
    active: number;
    suspended: number;
    admins: number;
    newInPeriod: number;
  };
  transactions: {
    total: number;
    completed: number;
    pending: number;
    failed: number;
    transfers: number;
    deposits: number;
  };
  feeRevenueMinor: number;
  transferVolumeMinor: number;
  depositVolumeMinor: number;
  wallets: {
    total: number;
    active: number;
    frozen: number;
    totalBalanceMinor: number;
  };
}

export interface DailyTransferTotal {
  /** UTC calendar day, YYYY-MM-DD */
  day: string;
  count: number;
  volumeMinor: number;
}

export interface AdminStatsView {
  period: StatsPeriod;
  since: string | null;
  generatedAt: string;
  users: AdminStatsSnapshot['users'];
  transactions: AdminStatsSnapshot['transactions'];
  revenue: number;
  transferVolume: number;
  depositVolume: number;
  wallets: {
    total: number;
    active: number;
    frozen: number;
    totalBalance: number;
  };
  trend: Array<{ date: string; count: number; volume: number }>;
}

export interface AdminUpdateUserParams {
  actorId: string;
  targetId: string;
  status?: UserStatus;
  role?: UserRole;
  ip?: string;
}
