/**
 * Wallet Service
 *
 * Wallet lookups and funding. Funding is the only balance mutation besides
 * transfers and goes through the same ledger unit of work.
 */

import { InvalidAmountError } from '../errors.js';
import type { DomainEventPublisher } from '../events.js';
import type { LedgerStore } from '../ledger/ledger-store.js';
import {
  ReceiverNotFoundError,
  WalletInactiveError,
  WalletNotFoundError,
} from '../ledger/ledger-errors.js';
import { formatMoney } from '../ledger/money.js';
import { generateReference } from '../ledger/reference.js';
import { presentTransaction, type TransactionView } from '../ledger/transaction-presenter.js';
import { presentWallet, type WalletView } from './wallet-presenter.js';
import type { WalletRepository } from './wallet-repository.js';

export const MAX_FUNDING_AMOUNT_MINOR = 1_000_000; // $10,000.00

export interface AddFundsResult {
  wallet: WalletView;
  transaction: TransactionView;
}

export class WalletService {
  constructor(
    private walletRepo: WalletRepository,
    private ledger: LedgerStore,
    private events: DomainEventPublisher,
    private maxFundingMinor: number = MAX_FUNDING_AMOUNT_MINOR
  ) {}

  /**
   * @throws WalletNotFoundError if the user has no wallet
   */
  async getWallet(userId: string): Promise<WalletView> {
    const wallet = await this.walletRepo.findByUserId(userId);
    if (!wallet) {
      throw new WalletNotFoundError(userId);
    }
    return presentWallet(wallet);
  }

  /**
   * Maps a public wallet number to its owner's user id
   * @throws ReceiverNotFoundError if no wallet has that number
   */
  async resolveWalletOwner(walletNumber: string): Promise<string> {
    const wallet = await this.walletRepo.findByWalletNumber(walletNumber);
    if (!wallet) {
      throw new ReceiverNotFoundError(`No wallet found with number ${walletNumber}`);
    }
    return wallet.userId;
  }

  /**
   * Credit a user's own wallet. Records a completed deposit (fee 0) with the
   * owner as both sender and receiver.
   */
  async addFunds(userId: string, amountMinor: number): Promise<AddFundsResult> {
    if (!Number.isSafeInteger(amountMinor) || amountMinor <= 0) {
      throw new InvalidAmountError('Amount must be greater than zero');
    }
    if (amountMinor > this.maxFundingMinor) {
      throw new InvalidAmountError(
        `Maximum funding amount is ${formatMoney(this.maxFundingMinor)}`
      );
    }

    const { wallet, transaction } = await this.ledger.runInTransaction(async (tx) => {
      const locked = await tx.lockWallets([userId]);
      const current = locked.get(userId);
      if (!current) {
        throw new WalletNotFoundError(userId);
      }
      if (current.status !== 'active') {
        throw new WalletInactiveError();
      }

      const credited = await tx.adjustBalance(current.id, amountMinor);
      const deposit = await tx.insertTransaction({
        reference: generateReference('DEP'),
        senderId: userId,
        receiverId: userId,
        amountMinor,
        feeMinor: 0,
        totalMinor: amountMinor,
        type: 'deposit',
        status: 'completed',
        note: 'Wallet top-up',
      });

      return { wallet: credited, transaction: deposit };
    });

    await this.events.emit({
      type: 'wallet.funded',
      userId,
      walletId: wallet.id,
      reference: transaction.reference,
      amountMinor,
      balanceMinor: wallet.balanceMinor,
    });

    return {
      wallet: presentWallet(wallet),
      transaction: presentTransaction(transaction, userId),
    };
  }
}
