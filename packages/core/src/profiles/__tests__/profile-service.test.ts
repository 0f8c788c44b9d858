/**
 * Profile Service Unit Tests
 *
 * Tests profile service business logic against in-memory repositories.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  InMemoryDatabase,
  InMemoryProfileRepository,
  InMemoryUserRepository,
  InMemoryWalletRepository,
  seedUser,
} from '../../testing/index.js';
import { ProfileService } from '../profile-service.js';
import { InvalidProfileDataError, ProfileNotFoundError } from '../profile-errors.js';

const UNKNOWN_USER = '00000000-0000-4000-8000-000000000000';

describe('ProfileService', () => {
  let db: InMemoryDatabase;
  let profileService: ProfileService;

  beforeEach(() => {
    db = new InMemoryDatabase();
    profileService = new ProfileService(
      new InMemoryProfileRepository(db),
      new InMemoryUserRepository(db),
      new InMemoryWalletRepository(db)
    );
  });

  describe('getCurrentProfile', () => {
    it('should return the user with a wallet snapshot', async () => {
      // Arrange
      const { user, wallet } = seedUser(db, {
        firstName: 'Ada',
        lastName: 'Lovelace',
        balanceMinor: 1234,
      });

      // Act
      const result = await profileService.getCurrentProfile(user.id);

      // Assert
      expect(result.user).toMatchObject({ id: user.id, firstName: 'Ada', lastName: 'Lovelace' });
      expect(result.wallet).toMatchObject({ walletNumber: wallet.walletNumber, balance: 12.34 });
    });

    it('should return a null wallet when none exists', async () => {
      const { user } = seedUser(db, { withoutWallet: true });

      const result = await profileService.getCurrentProfile(user.id);

      expect(result.wallet).toBeNull();
    });

    it('should throw ProfileNotFoundError for unknown users', async () => {
      await expect(profileService.getCurrentProfile(UNKNOWN_USER)).rejects.toThrow(
        ProfileNotFoundError
      );
    });
  });

  describe('updateProfile', () => {
    it('should update only the provided fields', async () => {
      const { user } = seedUser(db, { firstName: 'Ada', lastName: 'Lovelace' });

      const result = await profileService.updateProfile(user.id, {
        lastName: '  King ',
        country: 'UK',
      });

      expect(result.user).toMatchObject({
        firstName: 'Ada',
        lastName: 'King',
        country: 'UK',
        phone: null,
      });
      expect(db.users.get(user.id)?.lastName).toBe('King');
    });

    it('should clear optional fields set to null', async () => {
      const { user } = seedUser(db);
      await profileService.updateProfile(user.id, { phone: '+15550100' });

      const result = await profileService.updateProfile(user.id, { phone: null });

      expect(result.user.phone).toBeNull();
    });

    it('should reject blank names', async () => {
      const { user } = seedUser(db);

      await expect(profileService.updateProfile(user.id, { firstName: '   ' })).rejects.toThrow(
        new InvalidProfileDataError('First name cannot be empty')
      );
    });

    it('should reject an empty update', async () => {
      const { user } = seedUser(db);

      await expect(profileService.updateProfile(user.id, {})).rejects.toThrow(
        'At least one field must be provided'
      );
    });

    it('should throw ProfileNotFoundError for unknown users', async () => {
      await expect(
        profileService.updateProfile(UNKNOWN_USER, { firstName: 'Ghost' })
      ).rejects.toThrow(ProfileNotFoundError);
    });
  });
});
