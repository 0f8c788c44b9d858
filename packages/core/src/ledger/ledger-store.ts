/**
 * Ledger Store
 *
 * Unit of work for balance mutations. Everything done through a
 * LedgerTransaction commits together or not at all.
 */

import {
  transactions,
  users,
  wallets,
  type Database,
  type DatabaseTransaction,
  type TransactionRecord,
  type Wallet,
} from '@payflow/database';
import { asc, eq, inArray, sql } from 'drizzle-orm';
import type { LockedWallet, NewLedgerEntry } from './ledger-types.js';

export interface LedgerTransaction {
  /**
   * Row-locks the wallets of the given users, in ascending wallet id order,
   * and returns them keyed by user id. Missing wallets are simply absent.
   * Locks are held until the unit of work ends.
   */
  lockWallets(userIds: readonly string[]): Promise<Map<string, LockedWallet>>;
  /** Applies a signed delta; the store refuses to take a balance below zero. */
  adjustBalance(walletId: string, deltaMinor: number): Promise<Wallet>;
  insertTransaction(entry: NewLedgerEntry): Promise<TransactionRecord>;
}

export interface LedgerStore {
  runInTransaction<T>(work: (tx: LedgerTransaction) => Promise<T>): Promise<T>;
}

export class DrizzleLedgerStore implements LedgerStore {
  constructor(private db: Database) {}

  runInTransaction<T>(work: (tx: LedgerTransaction) => Promise<T>): Promise<T> {
    return this.db.transaction((tx) => work(new DrizzleLedgerTransaction(tx)));
  }
}

class DrizzleLedgerTransaction implements LedgerTransaction {
  constructor(private tx: DatabaseTransaction) {}

  async lockWallets(userIds: readonly string[]): Promise<Map<string, LockedWallet>> {
    const unique = [...new Set(userIds)];
    if (unique.length === 0) {
      return new Map();
    }

    // SELECT ... ORDER BY id FOR UPDATE: consistent lock order across transfers
    // Only wallet rows are locked; the owner's status is read alongside
    const rows = await this.tx
      .select({ wallet: wallets, ownerStatus: users.status })
      .from(wallets)
      .innerJoin(users, eq(users.id, wallets.userId))
      .where(inArray(wallets.userId, unique))
      .orderBy(asc(wallets.id))
      .for('update', { of: wallets });

    return new Map(
      rows.map((row) => [row.wallet.userId, { ...row.wallet, ownerStatus: row.ownerStatus }])
    );
  }

  async adjustBalance(walletId: string, deltaMinor: number): Promise<Wallet> {
    // wallets_balance_non_negative CHECK constraint backs the executor's own check
    const [updated] = await this.tx
      .update(wallets)
      .set({
        balanceMinor: sql`${wallets.balanceMinor} + ${deltaMinor}`,
        updatedAt: new Date(),
      })
      .where(eq(wallets.id, walletId))
      .returning();

    if (!updated) {
      throw new Error(`Wallet ${walletId} disappeared during ledger update`);
    }
    return updated;
  }

  async insertTransaction(entry: NewLedgerEntry): Promise<TransactionRecord> {
    const [inserted] = await this.tx.insert(transactions).values(entry).returning();
    if (!inserted) {
      throw new Error(`Failed to record transaction ${entry.reference}`);
    }
    return inserted;
  }
}
