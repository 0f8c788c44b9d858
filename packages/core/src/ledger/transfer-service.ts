/**
 * Transfer Service
 *
 * The transfer executor: debits the sender by amount + fee, credits the
 * receiver by amount and appends a completed transaction, all inside one
 * ledger unit of work with both wallets locked.
 */

import { InsufficientFundsError, SelfTransferError } from '../errors.js';
import type { DomainEventPublisher } from '../events.js';
import { defaultFeePolicy, type FeePolicy } from './fee-policy.js';
import type { LedgerStore } from './ledger-store.js';
import {
  ReceiverNotFoundError,
  WalletInactiveError,
  WalletNotFoundError,
} from './ledger-errors.js';
import type { TransferParams, TransferResult } from './ledger-types.js';
import { formatMoney } from './money.js';
import { generateReference } from './reference.js';

export class TransferService {
  constructor(
    private ledger: LedgerStore,
    private events: DomainEventPublisher,
    private feePolicy: FeePolicy = defaultFeePolicy
  ) {}

  /**
   * Business rules:
   * - Sender and receiver must differ (checked before any I/O)
   * - Amount must pass the fee policy
   * - Receiver must be an active account with an active wallet
   * - Sender wallet must be active and cover amount + fee
   * - Emits transfer.completed after commit
   */
  async transfer(params: TransferParams): Promise<TransferResult> {
    const { senderId, receiverId } = params;

    if (senderId === receiverId) {
      throw new SelfTransferError();
    }

    const quote = this.feePolicy.quote(params.amountMinor);
    const note = params.note?.trim() || null;

    const result = await this.ledger.runInTransaction(async (tx) => {
      const locked = await tx.lockWallets([senderId, receiverId]);

      const receiverWallet = locked.get(receiverId);
      if (
        !receiverWallet ||
        receiverWallet.status !== 'active' ||
        receiverWallet.ownerStatus !== 'active'
      ) {
        throw new ReceiverNotFoundError();
      }

      const senderWallet = locked.get(senderId);
      if (!senderWallet) {
        throw new WalletNotFoundError(senderId);
      }
      if (senderWallet.status !== 'active') {
        throw new WalletInactiveError();
      }

      if (senderWallet.balanceMinor < quote.totalMinor) {
        throw new InsufficientFundsError(
          `Insufficient funds: ${formatMoney(quote.totalMinor)} required (including ${formatMoney(quote.feeMinor)} fee), ${formatMoney(senderWallet.balanceMinor)} available`
        );
      }

      const debited = await tx.adjustBalance(senderWallet.id, -quote.totalMinor);
      const credited = await tx.adjustBalance(receiverWallet.id, quote.amountMinor);
      const transaction = await tx.insertTransaction({
        reference: generateReference('TXN'),
        senderId,
        receiverId,
        amountMinor: quote.amountMinor,
        feeMinor: quote.feeMinor,
        totalMinor: quote.totalMinor,
        type: 'transfer',
        status: 'completed',
        note,
      });

      return { transaction, senderWallet: debited, receiverWallet: credited };
    });

    await this.events.emit({
      type: 'transfer.completed',
      transactionId: result.transaction.id,
      reference: result.transaction.reference,
      senderId,
      receiverId,
      amountMinor: quote.amountMinor,
      feeMinor: quote.feeMinor,
      totalMinor: quote.totalMinor,
      senderBalanceMinor: result.senderWallet.balanceMinor,
      receiverBalanceMinor: result.receiverWallet.balanceMinor,
      note,
    });

    return result;
  }
}
