/**
 * Profile Service
 *
 * Business logic layer for profile operations.
 * Orchestrates profile, user and wallet data access through repositories.
 */

import type { UserRepository } from '../users/user-repository.js';
import { presentUser } from '../users/user-presenter.js';
import { presentWallet } from '../wallets/wallet-presenter.js';
import type { WalletRepository } from '../wallets/wallet-repository.js';
import { InvalidProfileDataError, ProfileNotFoundError } from './profile-errors.js';
import type { ProfileRepository } from './profile-repository.js';
import type { ProfileResponse, UpdateProfileData } from './profile-types.js';

export class ProfileService {
  constructor(
    private profileRepo: ProfileRepository,
    private userRepo: UserRepository,
    private walletRepo: WalletRepository
  ) {}

  /**
   * Get current user profile with wallet snapshot
   *
   * @throws ProfileNotFoundError if user doesn't exist
   */
  async getCurrentProfile(userId: string): Promise<ProfileResponse> {
    const user = await this.userRepo.findById(userId);
    if (!user) {
      throw new ProfileNotFoundError(userId);
    }

    const wallet = await this.walletRepo.findByUserId(userId);
    return {
      user: presentUser(user),
      wallet: wallet ? presentWallet(wallet) : null,
    };
  }

  /**
   * Update names and contact details
   *
   * @throws InvalidProfileDataError if nothing to update or a name is blank
   * @throws ProfileNotFoundError if user doesn't exist
   */
  async updateProfile(userId: string, data: UpdateProfileData): Promise<ProfileResponse> {
    const changes = this.validateProfileData(data);

    const updated = await this.profileRepo.update(userId, changes);
    if (!updated) {
      throw new ProfileNotFoundError(userId);
    }

    const wallet = await this.walletRepo.findByUserId(userId);
    return {
      user: presentUser(updated),
      wallet: wallet ? presentWallet(wallet) : null,
    };
  }

  /**
   * Drops undefined keys, trims names and rejects empty updates
   */
  private validateProfileData(data: UpdateProfileData): UpdateProfileData {
    const changes: UpdateProfileData = {};

    if (data.firstName !== undefined) {
      const firstName = data.firstName.trim();
      if (!firstName) {
        throw new InvalidProfileDataError('First name cannot be empty');
      }
      changes.firstName = firstName;
    }
    if (data.lastName !== undefined) {
      const lastName = data.lastName.trim();
      if (!lastName) {
        throw new InvalidProfileDataError('Last name cannot be empty');
      }
      changes.lastName = lastName;
    }
    if (data.phone !== undefined) {
      changes.phone = data.phone;
    }
    if (data.country !== undefined) {
      changes.country = data.country;
    }
    if (data.address !== undefined) {
      changes.address = data.address;
    }

    if (Object.keys(changes).length === 0) {
      throw new InvalidProfileDataError('At least one field must be provided');
    }
    return changes;
  }
}
