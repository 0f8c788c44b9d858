import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  InMemoryDatabase,
  InMemoryLedgerStore,
  InMemoryWalletRepository,
  balanceOf,
  seedUser,
} from '../../testing/index.js';
import { InvalidAmountError } from '../../errors.js';
import {
  ReceiverNotFoundError,
  WalletInactiveError,
  WalletNotFoundError,
} from '../../ledger/ledger-errors.js';
import { WalletService } from '../wallet-service.js';

describe('WalletService', () => {
  let db: InMemoryDatabase;
  let events: { emit: ReturnType<typeof vi.fn> };
  let service: WalletService;

  beforeEach(() => {
    db = new InMemoryDatabase();
    events = { emit: vi.fn() };
    service = new WalletService(new InMemoryWalletRepository(db), new InMemoryLedgerStore(db), events);
  });

  describe('getWallet', () => {
    it('returns the balance in major units', async () => {
      const { user, wallet } = seedUser(db, { balanceMinor: 4975 });

      const view = await service.getWallet(user.id);

      expect(view).toEqual({
        id: wallet.id,
        walletNumber: wallet.walletNumber,
        balance: 49.75,
        currency: 'USD',
        status: 'active',
        createdAt: wallet.createdAt.toISOString(),
        updatedAt: wallet.updatedAt.toISOString(),
      });
    });

    it('throws when the user has no wallet', async () => {
      const { user } = seedUser(db, { withoutWallet: true });

      await expect(service.getWallet(user.id)).rejects.toThrow(WalletNotFoundError);
    });
  });

  describe('resolveWalletOwner', () => {
    it('finds the owner regardless of case and whitespace', async () => {
      const { user, wallet } = seedUser(db);

      await expect(
        service.resolveWalletOwner(` ${wallet.walletNumber.toLowerCase()} `)
      ).resolves.toBe(user.id);
    });

    it('rejects unknown wallet numbers', async () => {
      await expect(service.resolveWalletOwner('WAL000')).rejects.toThrow(
        new ReceiverNotFoundError('No wallet found with number WAL000')
      );
    });
  });

  describe('addFunds', () => {
    it('credits the wallet and records a fee-free deposit', async () => {
      // Arrange
      const { user } = seedUser(db, { balanceMinor: 500 });

      // Act
      const result = await service.addFunds(user.id, 2500);

      // Assert
      expect(balanceOf(db, user.id)).toBe(3000);
      expect(result.wallet.balance).toBe(30);
      expect(result.transaction).toMatchObject({
        type: 'deposit',
        status: 'completed',
        direction: 'deposit',
        amount: 25,
        fee: 0,
        totalAmount: 25,
        senderId: user.id,
        receiverId: user.id,
        note: 'Wallet top-up',
      });
      expect(result.transaction.reference).toMatch(/^DEP/);
    });

    it('emits wallet.funded', async () => {
      const { user, wallet } = seedUser(db);

      const result = await service.addFunds(user.id, 10_000);

      expect(events.emit).toHaveBeenCalledWith({
        type: 'wallet.funded',
        userId: user.id,
        walletId: wallet.id,
        reference: result.transaction.reference,
        amountMinor: 10_000,
        balanceMinor: 10_000,
      });
    });

    it.each([0, -100, 12.5])('rejects %s', async (amount) => {
      const { user } = seedUser(db);

      await expect(service.addFunds(user.id, amount)).rejects.toThrow(
        'Amount must be greater than zero'
      );
      expect(db.transactions.size).toBe(0);
    });

    it('caps a single top-up at $10,000.00', async () => {
      const { user } = seedUser(db);

      await expect(service.addFunds(user.id, 1_000_001)).rejects.toThrow(InvalidAmountError);
      await expect(service.addFunds(user.id, 1_000_001)).rejects.toThrow(
        'Maximum funding amount is $10,000.00'
      );
      await expect(service.addFunds(user.id, 1_000_000)).resolves.toBeDefined();
    });

    it('refuses to fund a frozen wallet', async () => {
      const { user } = seedUser(db, { walletStatus: 'frozen' });

      await expect(service.addFunds(user.id, 1000)).rejects.toThrow(WalletInactiveError);
      expect(balanceOf(db, user.id)).toBe(0);
    });
  });
});
