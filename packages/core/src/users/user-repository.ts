/**
 * User Repository
 *
 * Data access layer for user operations.
 * Pure queries with no business logic.
 */

import {
  users,
  wallets,
  type Database,
  type User,
  type Wallet,
} from '@payflow/database';
import { and, asc, eq, ne } from 'drizzle-orm';
import { generateReference } from '../ledger/reference.js';
import { isUniqueViolation } from '../shared/database-errors.js';
import { DuplicateEmailError } from './user-errors.js';
import type { CreateUserData, UpdateUserAccessData } from './user-types.js';

export interface RecipientRecord {
  id: string;
  firstName: string;
  lastName: string;
  email: string;
  walletNumber: string;
}

export interface UserRepository {
  findById(userId: string): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;
  /**
   * Creates the user and their wallet atomically
   * @throws DuplicateEmailError when the email is taken (including races)
   */
  createWithWallet(data: CreateUserData): Promise<{ user: User; wallet: Wallet }>;
  updatePasswordHash(userId: string, passwordHash: string): Promise<void>;
  updateAccess(userId: string, data: UpdateUserAccessData): Promise<User | null>;
  /** Active users other than `excludeUserId` that hold an active wallet */
  listRecipients(excludeUserId: string): Promise<RecipientRecord[]>;
}

export function normalizeEmail(email: string): string {
  return email.toLowerCase().trim();
}

export class DrizzleUserRepository implements UserRepository {
  constructor(private db: Database) {}

  async findById(userId: string): Promise<User | null> {
    if (!isValidUuid(userId)) {
      return null;
    }
    const [user] = await this.db.select().from(users).where(eq(users.id, userId)).limit(1);
    return user ?? null;
  }

  async findByEmail(email: string): Promise<User | null> {
    const [user] = await this.db
      .select()
      .from(users)
      .where(eq(users.email, normalizeEmail(email)))
      .limit(1);
    return user ?? null;
  }

  async createWithWallet(data: CreateUserData): Promise<{ user: User; wallet: Wallet }> {
    try {
      return await this.db.transaction(async (tx) => {
        const [user] = await tx
          .insert(users)
          .values({ ...data, email: normalizeEmail(data.email) })
          .returning();
        if (!user) {
          throw new Error('User insert returned no row');
        }

        const [wallet] = await tx
          .insert(wallets)
          .values({ userId: user.id, walletNumber: generateReference('WAL') })
          .returning();
        if (!wallet) {
          throw new Error('Wallet insert returned no row');
        }

        return { user, wallet };
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateEmailError(normalizeEmail(data.email));
      }
      throw error;
    }
  }

  async updatePasswordHash(userId: string, passwordHash: string): Promise<void> {
    await this.db
      .update(users)
      .set({ passwordHash, updatedAt: new Date() })
      .where(eq(users.id, userId));
  }

  async updateAccess(userId: string, data: UpdateUserAccessData): Promise<User | null> {
    if (!isValidUuid(userId)) {
      return null;
    }
    const [updated] = await this.db
      .update(users)
      .set({ ...data, updatedAt: new Date() })
      .where(eq(users.id, userId))
      .returning();
    return updated ?? null;
  }

  async listRecipients(excludeUserId: string): Promise<RecipientRecord[]> {
    return this.db
      .select({
        id: users.id,
        firstName: users.firstName,
        lastName: users.lastName,
        email: users.email,
        walletNumber: wallets.walletNumber,
      })
      .from(users)
      .innerJoin(wallets, eq(wallets.userId, users.id))
      .where(
        and(
          ne(users.id, excludeUserId),
          eq(users.status, 'active'),
          eq(wallets.status, 'active')
        )
      )
      .orderBy(asc(users.firstName), asc(users.lastName));
  }
}

export function isValidUuid(value: string): boolean {
  return /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i.test(value.trim());
}
