/**
 * Admin Service
 *
 * Platform-wide listings and statistics, plus the one write an admin may
 * make: changing another account's status or role.
 */

import { UserNotFoundError } from '../users/user-errors.js';
import { presentUser } from '../users/user-presenter.js';
import type { UserRepository } from '../users/user-repository.js';
import type { AuthEventPublisher, UserView } from '../users/user-types.js';
import type { Page } from '../ledger/ledger-types.js';
import { toMajorUnits } from '../ledger/money.js';
import { presentTransaction, type TransactionView } from '../ledger/transaction-presenter.js';
import type { TransactionRepository } from '../ledger/transaction-repository.js';
import { presentWallet } from '../wallets/wallet-presenter.js';
import { EmptyAccessUpdateError, SelfModificationError } from './admin-errors.js';
import type { AdminRepository } from './admin-repository.js';
import type {
  AdminListTransactionsParams,
  AdminListUsersParams,
  AdminListWalletsParams,
  AdminStatsView,
  AdminUpdateUserParams,
  AdminUserDetailView,
  AdminUserRecord,
  AdminUserView,
  AdminWalletListView,
  StatsPeriod,
} from './admin-types.js';

const DAY_MS = 24 * 60 * 60 * 1000;
export const TREND_DAYS = 7;
export const RECENT_TRANSFERS_LIMIT = 10;

function presentUserRecord(record: AdminUserRecord): AdminUserView {
  return {
    ...presentUser(record.user),
    wallet: record.wallet ? presentWallet(record.wallet) : null,
    sentCount: record.sentCount,
    receivedCount: record.receivedCount,
  };
}

function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

/**
 * Lower bound for a reporting period; `all` has none
 */
export function periodStart(period: StatsPeriod, now: Date): Date | null {
  switch (period) {
    case 'today':
      return startOfUtcDay(now);
    case 'week':
      return new Date(now.getTime() - 7 * DAY_MS);
    case 'month':
      return new Date(now.getTime() - 30 * DAY_MS);
    case 'year':
      return new Date(now.getTime() - 365 * DAY_MS);
    case 'all':
      return null;
  }
}

export class AdminService {
  constructor(
    private adminRepo: AdminRepository,
    private userRepo: UserRepository,
    private transactionRepo: TransactionRepository,
    private authEvents: AuthEventPublisher,
    private now: () => Date = () => new Date()
  ) {}

  async listUsers(params: AdminListUsersParams): Promise<Page<AdminUserView>> {
    const page = await this.adminRepo.listUsers(params);
    return { ...page, items: page.items.map(presentUserRecord) };
  }

  /**
   * One user with their wallet and latest sent and received transfers,
   * presented from that user's point of view
   */
  async getUserDetail(userId: string): Promise<AdminUserDetailView> {
    const record = await this.adminRepo.findUser(userId);
    if (!record) {
      throw new UserNotFoundError(userId);
    }

    const recent = { limit: RECENT_TRANSFERS_LIMIT, offset: 0 };
    const [sent, received] = await Promise.all([
      this.transactionRepo.listForUser(userId, { ...recent, direction: 'sent' }),
      this.transactionRepo.listForUser(userId, { ...recent, direction: 'received' }),
    ]);

    return {
      ...presentUserRecord(record),
      recentTransactions: {
        sent: sent.items.map((item) => presentTransaction(item, userId)),
        received: received.items.map((item) => presentTransaction(item, userId)),
      },
    };
  }

  async listWallets(params: AdminListWalletsParams): Promise<AdminWalletListView> {
    const { summary, ...page } = await this.adminRepo.listWallets(params);
    return {
      ...page,
      items: page.items.map((record) => ({
        ...presentWallet(record.wallet),
        owner: {
          id: record.owner.id,
          name: `${record.owner.firstName} ${record.owner.lastName}`.trim(),
          email: record.owner.email,
          status: record.owner.status,
        },
        totals: {
          sent: toMajorUnits(record.sentTotalMinor),
          received: toMajorUnits(record.receivedTotalMinor),
        },
      })),
      statistics: {
        totalBalance: toMajorUnits(summary.totalBalanceMinor),
        activeWallets: summary.activeCount,
        averageBalance: toMajorUnits(
          Math.round(summary.totalBalanceMinor / Math.max(summary.walletCount, 1))
        ),
      },
    };
  }

  async listTransactions(params: AdminListTransactionsParams): Promise<Page<TransactionView>> {
    const page = await this.adminRepo.listTransactions(params);
    return { ...page, items: page.items.map((record) => presentTransaction(record)) };
  }

  /**
   * Aggregates for the period plus a zero-filled trend of completed
   * transfers over the last seven UTC days (today included)
   */
  async getStats(period: StatsPeriod): Promise<AdminStatsView> {
    const now = this.now();
    const since = periodStart(period, now);
    const trendStart = new Date(startOfUtcDay(now).getTime() - (TREND_DAYS - 1) * DAY_MS);

    const [snapshot, daily] = await Promise.all([
      this.adminRepo.getStatsSnapshot(since),
      this.adminRepo.dailyTransferTotals(trendStart),
    ]);

    const byDay = new Map(daily.map((entry) => [entry.day, entry]));
    const trend = Array.from({ length: TREND_DAYS }, (_, index) => {
      const date = new Date(trendStart.getTime() + index * DAY_MS).toISOString().slice(0, 10);
      const entry = byDay.get(date);
      return {
        date,
        count: entry?.count ?? 0,
        volume: toMajorUnits(entry?.volumeMinor ?? 0),
      };
    });

    return {
      period,
      since: since ? since.toISOString() : null,
      generatedAt: now.toISOString(),
      users: snapshot.users,
      transactions: snapshot.transactions,
      revenue: toMajorUnits(snapshot.feeRevenueMinor),
      transferVolume: toMajorUnits(snapshot.transferVolumeMinor),
      depositVolume: toMajorUnits(snapshot.depositVolumeMinor),
      wallets: {
        total: snapshot.wallets.total,
        active: snapshot.wallets.active,
        frozen: snapshot.wallets.frozen,
        totalBalance: toMajorUnits(snapshot.wallets.totalBalanceMinor),
      },
      trend,
    };
  }

  /**
   * Change another user's status and/or role
   *
   * Business rules:
   * - An admin cannot change their own account
   * - Only status and role are writable
   * - Emits user.status_changed for audit logging
   */
  async updateUser(params: AdminUpdateUserParams): Promise<UserView> {
    if (params.status === undefined && params.role === undefined) {
      throw new EmptyAccessUpdateError();
    }
    if (params.actorId === params.targetId) {
      throw new SelfModificationError();
    }

    const updated = await this.userRepo.updateAccess(params.targetId, {
      ...(params.status && { status: params.status }),
      ...(params.role && { role: params.role }),
    });
    if (!updated) {
      throw new UserNotFoundError(params.targetId);
    }

    await this.authEvents.emit({
      type: 'user.status_changed',
      userId: updated.id,
      email: updated.email,
      ...(params.ip && { ip: params.ip }),
      metadata: {
        actorId: params.actorId,
        ...(params.status && { status: params.status }),
        ...(params.role && { role: params.role }),
      },
    });

    return presentUser(updated);
  }
}
