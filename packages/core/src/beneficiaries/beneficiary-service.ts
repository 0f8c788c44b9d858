/**
 * Beneficiary Service
 *
 * Saved recipients, scoped to their owner. Every read and write by id checks
 * ownership before touching the row.
 */

import type { Beneficiary } from '@payflow/database';
import type { DomainEventPublisher } from '../events.js';
import type { WalletRepository } from '../wallets/wallet-repository.js';
import { BeneficiaryAccessDeniedError, BeneficiaryNotFoundError } from './beneficiary-errors.js';
import type { BeneficiaryRepository } from './beneficiary-repository.js';
import type {
  BeneficiaryChanges,
  BeneficiaryView,
  CreateBeneficiaryParams,
  UpdateBeneficiaryParams,
} from './beneficiary-types.js';

export function presentBeneficiary(beneficiary: Beneficiary): BeneficiaryView {
  return {
    id: beneficiary.id,
    name: beneficiary.name,
    email: beneficiary.email,
    walletNumber: beneficiary.walletNumber,
    phone: beneficiary.phone,
    relationship: beneficiary.relationship,
    beneficiaryUserId: beneficiary.beneficiaryUserId,
    createdAt: beneficiary.createdAt.toISOString(),
    updatedAt: beneficiary.updatedAt.toISOString(),
  };
}

export class BeneficiaryService {
  constructor(
    private beneficiaryRepo: BeneficiaryRepository,
    private walletRepo: WalletRepository,
    private events: DomainEventPublisher
  ) {}

  async listBeneficiaries(userId: string): Promise<BeneficiaryView[]> {
    const rows = await this.beneficiaryRepo.listByUser(userId);
    return rows.map(presentBeneficiary);
  }

  /**
   * @throws BeneficiaryNotFoundError / BeneficiaryAccessDeniedError
   */
  async getBeneficiary(userId: string, beneficiaryId: string): Promise<BeneficiaryView> {
    const beneficiary = await this.requireOwned(userId, beneficiaryId);
    return presentBeneficiary(beneficiary);
  }

  async createBeneficiary(
    userId: string,
    params: CreateBeneficiaryParams
  ): Promise<BeneficiaryView> {
    const walletNumber = normalizeWalletNumber(params.walletNumber);
    const created = await this.beneficiaryRepo.create({
      userId,
      name: params.name.trim(),
      email: params.email.toLowerCase().trim(),
      walletNumber,
      phone: params.phone ?? null,
      relationship: params.relationship ?? null,
      beneficiaryUserId: await this.linkedUserId(walletNumber),
    });

    await this.events.emit({
      type: 'beneficiary.added',
      userId,
      beneficiaryId: created.id,
      name: created.name,
    });

    return presentBeneficiary(created);
  }

  async updateBeneficiary(
    userId: string,
    beneficiaryId: string,
    params: UpdateBeneficiaryParams
  ): Promise<BeneficiaryView> {
    await this.requireOwned(userId, beneficiaryId);

    const changes: BeneficiaryChanges = {};
    if (params.name !== undefined) {
      changes.name = params.name.trim();
    }
    if (params.email !== undefined) {
      changes.email = params.email.toLowerCase().trim();
    }
    if (params.walletNumber !== undefined) {
      changes.walletNumber = normalizeWalletNumber(params.walletNumber);
      changes.beneficiaryUserId = await this.linkedUserId(changes.walletNumber);
    }
    if (params.phone !== undefined) {
      changes.phone = params.phone;
    }
    if (params.relationship !== undefined) {
      changes.relationship = params.relationship;
    }

    const updated = await this.beneficiaryRepo.update(beneficiaryId, changes);
    if (!updated) {
      throw new BeneficiaryNotFoundError(beneficiaryId);
    }

    await this.events.emit({
      type: 'beneficiary.updated',
      userId,
      beneficiaryId,
      name: updated.name,
    });

    return presentBeneficiary(updated);
  }

  async deleteBeneficiary(userId: string, beneficiaryId: string): Promise<void> {
    const existing = await this.requireOwned(userId, beneficiaryId);

    const deleted = await this.beneficiaryRepo.delete(beneficiaryId);
    if (!deleted) {
      throw new BeneficiaryNotFoundError(beneficiaryId);
    }

    await this.events.emit({
      type: 'beneficiary.removed',
      userId,
      beneficiaryId,
      name: existing.name,
    });
  }

  private async requireOwned(userId: string, beneficiaryId: string): Promise<Beneficiary> {
    const beneficiary = await this.beneficiaryRepo.findById(beneficiaryId);
    if (!beneficiary) {
      throw new BeneficiaryNotFoundError(beneficiaryId);
    }
    if (beneficiary.userId !== userId) {
      throw new BeneficiaryAccessDeniedError();
    }
    return beneficiary;
  }

  private async linkedUserId(walletNumber: string): Promise<string | null> {
    const wallet = await this.walletRepo.findByWalletNumber(walletNumber);
    return wallet?.userId ?? null;
  }
}

function normalizeWalletNumber(walletNumber: string): string {
  return walletNumber.trim().toUpperCase();
}
