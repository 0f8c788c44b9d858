/**
 * Admin Repository
 *
 * Cross-user reporting queries. Read-only; access changes go through
 * UserRepository.updateAccess.
 */

import {
  transactions,
  users,
  wallets,
  type Database,
} from '@payflow/database';
import { and, count, desc, eq, gte, ilike, lte, or, sql, type AnyColumn, type SQL } from 'drizzle-orm';
import type { Page, TransactionWithParties } from '../ledger/ledger-types.js';
import {
  selectTransactionsWithParties,
  toTransactionWithParties,
  transactionReceivers,
  transactionSenders,
} from '../ledger/transaction-repository.js';
import type {
  AdminListTransactionsParams,
  AdminListUsersParams,
  AdminListWalletsParams,
  AdminStatsSnapshot,
  AdminUserRecord,
  AdminWalletPage,
  DailyTransferTotal,
} from './admin-types.js';

export interface AdminRepository {
  listUsers(params: AdminListUsersParams): Promise<Page<AdminUserRecord>>;
  findUser(userId: string): Promise<AdminUserRecord | null>;
  listWallets(params: AdminListWalletsParams): Promise<AdminWalletPage>;
  listTransactions(params: AdminListTransactionsParams): Promise<Page<TransactionWithParties>>;
  /** `since: null` aggregates over all time */
  getStatsSnapshot(since: Date | null): Promise<AdminStatsSnapshot>;
  /** Completed transfers grouped by UTC day, from `since` onwards; days without transfers are omitted */
  dailyTransferTotals(since: Date): Promise<DailyTransferTotal[]>;
}

export function likePattern(search: string): string {
  return `%${search.replace(/[\\%_]/g, '\\$&')}%`;
}

function countWhere(condition: SQL) {
  return sql<number>`count(*) filter (where ${condition})`.mapWith(Number);
}

function sumWhere(column: AnyColumn, condition: SQL) {
  return sql<number>`coalesce(sum(${column}) filter (where ${condition}), 0)`.mapWith(Number);
}

// Transfer counts per user, correlated on users.id
const userRecordColumns = {
  user: users,
  wallet: wallets,
  sentCount: sql<number>`(select count(*) from ${transactions} where ${transactions.senderId} = ${users.id} and ${transactions.type} = 'transfer')`.mapWith(
    Number
  ),
  receivedCount: sql<number>`(select count(*) from ${transactions} where ${transactions.receiverId} = ${users.id} and ${transactions.type} = 'transfer')`.mapWith(
    Number
  ),
};

export class DrizzleAdminRepository implements AdminRepository {
  constructor(private db: Database) {}

  async listUsers(params: AdminListUsersParams): Promise<Page<AdminUserRecord>> {
    const search = params.search?.trim();
    const where = and(
      search
        ? or(
            ilike(users.firstName, likePattern(search)),
            ilike(users.lastName, likePattern(search)),
            ilike(users.email, likePattern(search))
          )
        : undefined,
      params.status ? eq(users.status, params.status) : undefined
    );

    const [rows, [totals]] = await Promise.all([
      this.db
        .select(userRecordColumns)
        .from(users)
        .leftJoin(wallets, eq(wallets.userId, users.id))
        .where(where)
        .orderBy(desc(users.createdAt), desc(users.id))
        .limit(params.limit)
        .offset(params.offset),
      this.db.select({ total: count() }).from(users).where(where),
    ]);

    return {
      items: rows,
      total: totals?.total ?? 0,
      limit: params.limit,
      offset: params.offset,
    };
  }

  async findUser(userId: string): Promise<AdminUserRecord | null> {
    const [row] = await this.db
      .select(userRecordColumns)
      .from(users)
      .leftJoin(wallets, eq(wallets.userId, users.id))
      .where(eq(users.id, userId))
      .limit(1);
    return row ?? null;
  }

  async listWallets(params: AdminListWalletsParams): Promise<AdminWalletPage> {
    const search = params.search?.trim();
    const where = and(
      search
        ? or(
            ilike(users.firstName, likePattern(search)),
            ilike(users.lastName, likePattern(search)),
            ilike(users.email, likePattern(search)),
            ilike(wallets.walletNumber, likePattern(search))
          )
        : undefined,
      params.status ? eq(wallets.status, params.status) : undefined
    );

    const [rows, [totals], [summary]] = await Promise.all([
      this.db
        .select({
          wallet: wallets,
          owner: {
            id: users.id,
            firstName: users.firstName,
            lastName: users.lastName,
            email: users.email,
            status: users.status,
          },
          sentTotalMinor: sql<number>`(select coalesce(sum(${transactions.totalMinor}), 0) from ${transactions} where ${transactions.senderId} = ${wallets.userId} and ${transactions.type} = 'transfer' and ${transactions.status} = 'completed')`.mapWith(
            Number
          ),
          receivedTotalMinor: sql<number>`(select coalesce(sum(${transactions.amountMinor}), 0) from ${transactions} where ${transactions.receiverId} = ${wallets.userId} and ${transactions.senderId} <> ${wallets.userId} and ${transactions.type} = 'transfer' and ${transactions.status} = 'completed')`.mapWith(
            Number
          ),
        })
        .from(wallets)
        .innerJoin(users, eq(users.id, wallets.userId))
        .where(where)
        .orderBy(desc(wallets.createdAt), desc(wallets.id))
        .limit(params.limit)
        .offset(params.offset),
      this.db
        .select({ total: count() })
        .from(wallets)
        .innerJoin(users, eq(users.id, wallets.userId))
        .where(where),
      this.db
        .select({
          walletCount: count(),
          activeCount: countWhere(sql`${wallets.status} = 'active'`),
          totalBalanceMinor: sql<number>`coalesce(sum(${wallets.balanceMinor}), 0)`.mapWith(Number),
        })
        .from(wallets),
    ]);

    return {
      items: rows,
      total: totals?.total ?? 0,
      limit: params.limit,
      offset: params.offset,
      summary: {
        walletCount: summary?.walletCount ?? 0,
        activeCount: summary?.activeCount ?? 0,
        totalBalanceMinor: summary?.totalBalanceMinor ?? 0,
      },
    };
  }

  async listTransactions(
    params: AdminListTransactionsParams
  ): Promise<Page<TransactionWithParties>> {
    const search = params.search?.trim();
    const where = and(
      params.type ? eq(transactions.type, params.type) : undefined,
      params.status ? eq(transactions.status, params.status) : undefined,
      params.from ? gte(transactions.createdAt, params.from) : undefined,
      params.to ? lte(transactions.createdAt, params.to) : undefined,
      search
        ? or(
            ilike(transactions.reference, likePattern(search)),
            ilike(transactionSenders.email, likePattern(search)),
            ilike(transactionReceivers.email, likePattern(search))
          )
        : undefined
    );

    const [rows, [totals]] = await Promise.all([
      selectTransactionsWithParties(this.db)
        .where(where)
        .orderBy(desc(transactions.createdAt), desc(transactions.id))
        .limit(params.limit)
        .offset(params.offset),
      this.db
        .select({ total: count() })
        .from(transactions)
        .leftJoin(transactionSenders, eq(transactions.senderId, transactionSenders.id))
        .leftJoin(transactionReceivers, eq(transactions.receiverId, transactionReceivers.id))
        .where(where),
    ]);

    return {
      items: rows.map(toTransactionWithParties),
      total: totals?.total ?? 0,
      limit: params.limit,
      offset: params.offset,
    };
  }

  async getStatsSnapshot(since: Date | null): Promise<AdminStatsSnapshot> {
    const isTransfer = sql`${transactions.type} = 'transfer'`;
    const isDeposit = sql`${transactions.type} = 'deposit'`;
    const isCompleted = sql`${transactions.status} = 'completed'`;

    const [[userRow], [transactionRow], [walletRow]] = await Promise.all([
      this.db
        .select({
          total: count(),
          active: countWhere(sql`${users.status} = 'active'`),
          suspended: countWhere(sql`${users.status} = 'suspended'`),
          admins: countWhere(sql`${users.role} = 'admin'`),
          newInPeriod: since ? countWhere(sql`${users.createdAt} >= ${since}`) : count(),
        })
        .from(users),
      this.db
        .select({
          total: count(),
          completed: countWhere(isCompleted),
          pending: countWhere(sql`${transactions.status} = 'pending'`),
          failed: countWhere(sql`${transactions.status} = 'failed'`),
          transfers: countWhere(isTransfer),
          deposits: countWhere(isDeposit),
          feeRevenueMinor: sumWhere(transactions.feeMinor, sql`${isTransfer} and ${isCompleted}`),
          transferVolumeMinor: sumWhere(
            transactions.amountMinor,
            sql`${isTransfer} and ${isCompleted}`
          ),
          depositVolumeMinor: sumWhere(
            transactions.amountMinor,
            sql`${isDeposit} and ${isCompleted}`
          ),
        })
        .from(transactions)
        .where(since ? gte(transactions.createdAt, since) : undefined),
      this.db
        .select({
          total: count(),
          active: countWhere(sql`${wallets.status} = 'active'`),
          frozen: countWhere(sql`${wallets.status} = 'frozen'`),
          totalBalanceMinor: sql<number>`coalesce(sum(${wallets.balanceMinor}), 0)`.mapWith(Number),
        })
        .from(wallets),
    ]);

    return {
      users: {
        total: userRow?.total ?? 0,
        active: userRow?.active ?? 0,
        suspended: userRow?.suspended ?? 0,
        admins: userRow?.admins ?? 0,
        newInPeriod: userRow?.newInPeriod ?? 0,
      },
      transactions: {
        total: transactionRow?.total ?? 0,
        completed: transactionRow?.completed ?? 0,
        pending: transactionRow?.pending ?? 0,
        failed: transactionRow?.failed ?? 0,
        transfers: transactionRow?.transfers ?? 0,
        deposits: transactionRow?.deposits ?? 0,
      },
      feeRevenueMinor: transactionRow?.feeRevenueMinor ?? 0,
      transferVolumeMinor: transactionRow?.transferVolumeMinor ?? 0,
      depositVolumeMinor: transactionRow?.depositVolumeMinor ?? 0,
      wallets: {
        total: walletRow?.total ?? 0,
        active: walletRow?.active ?? 0,
        frozen: walletRow?.frozen ?? 0,
        totalBalanceMinor: walletRow?.totalBalanceMinor ?? 0,
      },
    };
  }

  async dailyTransferTotals(since: Date): Promise<DailyTransferTotal[]> {
    const day = sql<string>`to_char(${transactions.createdAt} at time zone 'UTC', 'YYYY-MM-DD')`;

    return this.db
      .select({
        day,
        count: count(),
        volumeMinor: sql<number>`coalesce(sum(${transactions.amountMinor}), 0)`.mapWith(Number),
      })
      .from(transactions)
      .where(
        and(
          eq(transactions.type, 'transfer'),
          eq(transactions.status, 'completed'),
          gte(transactions.createdAt, since)
        )
      )
      .groupBy(day)
      .orderBy(day);
  }
}
