/**
 * Transaction Repository
 *
 * Read side of the ledger. Writes only happen through LedgerStore.
 */

import {
  transactions,
  users,
  type DatabaseOrTransaction,
  type TransactionRecord,
} from '@payflow/database';
import { and, count, desc, eq, ne, or, type SQL } from 'drizzle-orm';
import { alias } from 'drizzle-orm/pg-core';
import type {
  ListTransactionsParams,
  Page,
  PartySummary,
  TransactionWithParties,
} from './ledger-types.js';

export interface TransactionRepository {
  findByReference(reference: string): Promise<TransactionWithParties | null>;
  listForUser(userId: string, params: ListTransactionsParams): Promise<Page<TransactionWithParties>>;
}

export const transactionSenders = alias(users, 'sender');
export const transactionReceivers = alias(users, 'receiver');

function directionFilter(userId: string, direction: ListTransactionsParams['direction']): SQL | undefined {
  switch (direction) {
    case 'sent':
      // Deposits name the owner on both sides; they are neither sent nor received
      return and(eq(transactions.senderId, userId), ne(transactions.type, 'deposit'));
    case 'received':
      return and(
        eq(transactions.receiverId, userId),
        ne(transactions.senderId, userId),
        eq(transactions.type, 'transfer')
      );
    case 'all':
      return or(eq(transactions.senderId, userId), eq(transactions.receiverId, userId));
  }
}

export class DrizzleTransactionRepository implements TransactionRepository {
  constructor(private db: DatabaseOrTransaction) {}

  async findByReference(reference: string): Promise<TransactionWithParties | null> {
    const [row] = await selectTransactionsWithParties(this.db)
      .where(eq(transactions.reference, reference))
      .limit(1);
    return row ? toTransactionWithParties(row) : null;
  }

  async listForUser(
    userId: string,
    params: ListTransactionsParams
  ): Promise<Page<TransactionWithParties>> {
    const where = directionFilter(userId, params.direction);

    const [rows, [totals]] = await Promise.all([
      selectTransactionsWithParties(this.db)
        .where(where)
        .orderBy(desc(transactions.createdAt), desc(transactions.id))
        .limit(params.limit)
        .offset(params.offset),
      this.db.select({ total: count() }).from(transactions).where(where),
    ]);

    return {
      items: rows.map(toTransactionWithParties),
      total: totals?.total ?? 0,
      limit: params.limit,
      offset: params.offset,
    };
  }
}

/**
 * Transactions joined with both parties' names. Returned in dynamic mode so
 * callers can add their own filters and paging.
 */
export function selectTransactionsWithParties(db: DatabaseOrTransaction) {
  return db
    .select({
      transaction: transactions,
      sender: {
        id: transactionSenders.id,
        firstName: transactionSenders.firstName,
        lastName: transactionSenders.lastName,
        email: transactionSenders.email,
      },
      receiver: {
        id: transactionReceivers.id,
        firstName: transactionReceivers.firstName,
        lastName: transactionReceivers.lastName,
        email: transactionReceivers.email,
      },
    })
    .from(transactions)
    .leftJoin(transactionSenders, eq(transactions.senderId, transactionSenders.id))
    .leftJoin(transactionReceivers, eq(transactions.receiverId, transactionReceivers.id))
    .$dynamic();
}

export function toTransactionWithParties(row: {
  transaction: TransactionRecord;
  sender: PartySummary | null;
  receiver: PartySummary | null;
}): TransactionWithParties {
  return { ...row.transaction, sender: row.sender, receiver: row.receiver };
}
