/**
 * User Domain Types
 *
 * Type definitions for user service operations.
 */

import type { AuthEvent } from '@payflow/auth';
import type { UserRole, UserStatus } from '@payflow/database';
import type { WalletView } from '../wallets/wallet-presenter.js';

export interface RegisterUserParams {
  firstName: string;
  lastName: string;
  email: string;
  password: string;
  phone?: string | null;
  country?: string | null;
  address?: string | null;
  ip?: string; // For audit logging
}

export interface UserView {
  id: string;
  firstName: string;
  lastName: string;
  email: string;
  phone: string | null;
  country: string | null;
  address: string | null;
  role: UserRole;
  status: UserStatus;
  createdAt: string;
  updatedAt: string;
}

export interface RegisterUserResult {
  user: UserView;
  wallet: WalletView;
}

export interface AuthenticateParams {
  email: string;
  password: string;
  ip?: string;
}

export interface ChangePasswordParams {
  userId: string;
  currentPassword: string;
  newPassword: string;
  ip?: string;
}

export interface CreateUserData {
  firstName: string;
  lastName: string;
  email: string;
  passwordHash: string;
  phone: string | null;
  country: string | null;
  address: string | null;
  role?: UserRole;
}

export interface UpdateUserAccessData {
  status?: UserStatus;
  role?: UserRole;
}

export interface RecipientView {
  id: string;
  name: string;
  email: string;
  walletNumber: string;
}

/**
 * What services need from the auth event emitter; tests pass `{ emit: vi.fn() }`.
 */
export interface AuthEventPublisher {
  emit(event: Omit<AuthEvent, 'timestamp'>): void | Promise<void>;
}
