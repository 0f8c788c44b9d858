import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  InMemoryBeneficiaryRepository,
  InMemoryDatabase,
  InMemoryWalletRepository,
  seedUser,
  type SeededUser,
} from '../../testing/index.js';
import { BeneficiaryAccessDeniedError, BeneficiaryNotFoundError } from '../beneficiary-errors.js';
import { BeneficiaryService } from '../beneficiary-service.js';

describe('BeneficiaryService', () => {
  let db: InMemoryDatabase;
  let events: { emit: ReturnType<typeof vi.fn> };
  let service: BeneficiaryService;
  let owner: SeededUser;
  let stranger: SeededUser;

  beforeEach(() => {
    db = new InMemoryDatabase();
    events = { emit: vi.fn() };
    service = new BeneficiaryService(
      new InMemoryBeneficiaryRepository(db),
      new InMemoryWalletRepository(db),
      events
    );
    owner = seedUser(db);
    stranger = seedUser(db);
  });

  describe('createBeneficiary', () => {
    it('normalizes input and links a registered wallet', async () => {
      const friend = seedUser(db, { firstName: 'Fran' });

      const created = await service.createBeneficiary(owner.user.id, {
        name: '  Fran  ',
        email: 'Fran@Example.com',
        walletNumber: ` ${friend.wallet.walletNumber.toLowerCase()} `,
        relationship: 'friend',
      });

      expect(created).toMatchObject({
        name: 'Fran',
        email: 'fran@example.com',
        walletNumber: friend.wallet.walletNumber,
        phone: null,
        relationship: 'friend',
        beneficiaryUserId: friend.user.id,
      });
      expect(events.emit).toHaveBeenCalledWith({
        type: 'beneficiary.added',
        userId: owner.user.id,
        beneficiaryId: created.id,
        name: 'Fran',
      });
    });

    it('stores unknown wallet numbers without a link', async () => {
      const created = await service.createBeneficiary(owner.user.id, {
        name: 'Outside',
        email: 'outside@example.com',
        walletNumber: 'WALUNKNOWN',
      });

      expect(created.beneficiaryUserId).toBeNull();
    });
  });

  describe('ownership', () => {
    let beneficiaryId: string;

    beforeEach(async () => {
      const created = await service.createBeneficiary(owner.user.id, {
        name: 'Fran',
        email: 'fran@example.com',
        walletNumber: 'WAL123',
      });
      beneficiaryId = created.id;
      events.emit.mockClear();
    });

    it('lists only the caller’s beneficiaries', async () => {
      await expect(service.listBeneficiaries(owner.user.id)).resolves.toHaveLength(1);
      await expect(service.listBeneficiaries(stranger.user.id)).resolves.toEqual([]);
    });

    it('forbids reading, updating or deleting another user’s beneficiary', async () => {
      await expect(service.getBeneficiary(stranger.user.id, beneficiaryId)).rejects.toThrow(
        BeneficiaryAccessDeniedError
      );
      await expect(
        service.updateBeneficiary(stranger.user.id, beneficiaryId, { name: 'Hijacked' })
      ).rejects.toThrow(BeneficiaryAccessDeniedError);
      await expect(service.deleteBeneficiary(stranger.user.id, beneficiaryId)).rejects.toThrow(
        BeneficiaryAccessDeniedError
      );

      expect(db.beneficiaries.get(beneficiaryId)?.name).toBe('Fran');
      expect(events.emit).not.toHaveBeenCalled();
    });

    it('updates and relinks when the wallet number changes', async () => {
      const friend = seedUser(db);

      const updated = await service.updateBeneficiary(owner.user.id, beneficiaryId, {
        walletNumber: friend.wallet.walletNumber,
        phone: '+15550100',
      });

      expect(updated).toMatchObject({
        name: 'Fran',
        walletNumber: friend.wallet.walletNumber,
        beneficiaryUserId: friend.user.id,
        phone: '+15550100',
      });
      expect(events.emit).toHaveBeenCalledWith({
        type: 'beneficiary.updated',
        userId: owner.user.id,
        beneficiaryId,
        name: 'Fran',
      });
    });

    it('deletes the owner’s beneficiary', async () => {
      await service.deleteBeneficiary(owner.user.id, beneficiaryId);

      expect(db.beneficiaries.has(beneficiaryId)).toBe(false);
      expect(events.emit).toHaveBeenCalledWith({
        type: 'beneficiary.removed',
        userId: owner.user.id,
        beneficiaryId,
        name: 'Fran',
      });
      await expect(service.getBeneficiary(owner.user.id, beneficiaryId)).rejects.toThrow(
        BeneficiaryNotFoundError
      );
    });
  });
});
