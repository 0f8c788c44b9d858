/**
 * Beneficiary Repository
 *
 * Plain row access; ownership is enforced by the service.
 */

import { beneficiaries, type Beneficiary, type DatabaseOrTransaction } from '@payflow/database';
import { desc, eq } from 'drizzle-orm';
import { isValidUuid } from '../users/user-repository.js';
import type { BeneficiaryChanges, BeneficiaryData } from './beneficiary-types.js';

export interface BeneficiaryRepository {
  listByUser(userId: string): Promise<Beneficiary[]>;
  findById(beneficiaryId: string): Promise<Beneficiary | null>;
  create(data: BeneficiaryData): Promise<Beneficiary>;
  update(beneficiaryId: string, changes: BeneficiaryChanges): Promise<Beneficiary | null>;
  delete(beneficiaryId: string): Promise<boolean>;
}

export class DrizzleBeneficiaryRepository implements BeneficiaryRepository {
  constructor(private db: DatabaseOrTransaction) {}

  async listByUser(userId: string): Promise<Beneficiary[]> {
    return this.db
      .select()
      .from(beneficiaries)
      .where(eq(beneficiaries.userId, userId))
      .orderBy(desc(beneficiaries.createdAt));
  }

  async findById(beneficiaryId: string): Promise<Beneficiary | null> {
    if (!isValidUuid(beneficiaryId)) {
      return null;
    }
    const [row] = await this.db
      .select()
      .from(beneficiaries)
      .where(eq(beneficiaries.id, beneficiaryId))
      .limit(1);
    return row ?? null;
  }

  async create(data: BeneficiaryData): Promise<Beneficiary> {
    const [row] = await this.db.insert(beneficiaries).values(data).returning();
    if (!row) {
      throw new Error('Beneficiary insert returned no row');
    }
    return row;
  }

  async update(beneficiaryId: string, changes: BeneficiaryChanges): Promise<Beneficiary | null> {
    const [row] = await this.db
      .update(beneficiaries)
      .set({ ...changes, updatedAt: new Date() })
      .where(eq(beneficiaries.id, beneficiaryId))
      .returning();
    return row ?? null;
  }

  async delete(beneficiaryId: string): Promise<boolean> {
    const deleted = await this.db
      .delete(beneficiaries)
      .where(eq(beneficiaries.id, beneficiaryId))
      .returning({ id: beneficiaries.id });
    return deleted.length > 0;
  }
}
