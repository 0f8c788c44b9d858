import { randomUUID } from 'node:crypto';
import type {
  User,
  UserRole,
  UserStatus,
  Wallet,
  WalletStatus,
} from '@payflow/database';
import { generateReference } from '../ledger/reference.js';
import type { InMemoryDatabase } from './in-memory-database.js';

export interface SeedUserOptions {
  firstName?: string;
  lastName?: string;
  email?: string;
  /** Defaults to an unusable hash; pass `await hashPassword(...)` when a login is needed */
  passwordHash?: string;
  role?: UserRole;
  status?: UserStatus;
  balanceMinor?: number;
  walletStatus?: WalletStatus;
  /** Seed without a wallet */
  withoutWallet?: boolean;
}

export interface SeededUser {
  user: User;
  wallet: Wallet;
}

let seeded = 0;

/**
 * Writes a user and wallet straight into the store, bypassing services
 */
export function seedUser(state: InMemoryDatabase, options: SeedUserOptions = {}): SeededUser {
  seeded += 1;
  const now = state.now();
  const user: User = {
    id: randomUUID(),
    firstName: options.firstName ?? 'Test',
    lastName: options.lastName ?? `User${seeded}`,
    email: options.email ?? `user${seeded}@example.com`,
    passwordHash: options.passwordHash ?? 'scrypt$16384$placeholder$placeholder',
    phone: null,
    country: null,
    address: null,
    role: options.role ?? 'user',
    status: options.status ?? 'active',
    createdAt: now,
    updatedAt: now,
  };
  const wallet: Wallet = {
    id: randomUUID(),
    walletNumber: generateReference('WAL'),
    userId: user.id,
    balanceMinor: options.balanceMinor ?? 0,
    currency: 'USD',
    status: options.walletStatus ?? 'active',
    createdAt: now,
    updatedAt: now,
  };

  state.users.set(user.id, user);
  if (!options.withoutWallet) {
    state.wallets.set(wallet.id, wallet);
  }
  return { user: { ...user }, wallet: { ...wallet } };
}

/**
 * Current balance of a user's wallet, in minor units
 */
export function balanceOf(state: InMemoryDatabase, userId: string): number {
  const wallet = state.walletOf(userId);
  if (!wallet) {
    throw new Error(`No wallet seeded for user ${userId}`);
  }
  return wallet.balanceMinor;
}
