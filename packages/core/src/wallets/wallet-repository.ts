/**
 * Wallet Repository
 *
 * Read-only lookups. Balances change only through the ledger store.
 */

import { wallets, type DatabaseOrTransaction, type Wallet } from '@payflow/database';
import { eq } from 'drizzle-orm';

export interface WalletRepository {
  findByUserId(userId: string): Promise<Wallet | null>;
  findByWalletNumber(walletNumber: string): Promise<Wallet | null>;
}

export class DrizzleWalletRepository implements WalletRepository {
  constructor(private db: DatabaseOrTransaction) {}

  async findByUserId(userId: string): Promise<Wallet | null> {
    const [wallet] = await this.db.select().from(wallets).where(eq(wallets.userId, userId)).limit(1);
    return wallet ?? null;
  }

  async findByWalletNumber(walletNumber: string): Promise<Wallet | null> {
    const [wallet] = await this.db
      .select()
      .from(wallets)
      .where(eq(wallets.walletNumber, walletNumber.trim().toUpperCase()))
      .limit(1);
    return wallet ?? null;
  }
}
