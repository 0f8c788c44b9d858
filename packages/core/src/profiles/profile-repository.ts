/**
 * Profile Repository
 *
 * Data access for the profile fields stored on the user row.
 */

import { users, type DatabaseOrTransaction, type User } from '@payflow/database';
import { eq } from 'drizzle-orm';
import { isValidUuid } from '../users/user-repository.js';
import type { UpdateProfileData } from './profile-types.js';

export interface ProfileRepository {
  update(userId: string, data: UpdateProfileData): Promise<User | null>;
}

export class DrizzleProfileRepository implements ProfileRepository {
  constructor(private db: DatabaseOrTransaction) {}

  async update(userId: string, data: UpdateProfileData): Promise<User | null> {
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
}
