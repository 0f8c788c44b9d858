/**
 * Profile Domain Types
 *
 * Type definitions for profile service operations.
 */

import type { UserView } from '../users/user-types.js';
import type { WalletView } from '../wallets/wallet-presenter.js';

/**
 * Fields a user may change on their own profile. Email, role and status are
 * deliberately absent.
 */
export interface UpdateProfileData {
  firstName?: string;
  lastName?: string;
  phone?: string | null;
  country?: string | null;
  address?: string | null;
}

export interface ProfileResponse {
  user: UserView;
  wallet: WalletView | null;
}
