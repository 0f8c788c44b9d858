/**
 * Transaction Service
 *
 * Read access to a user's own transaction history.
 */

import { TransactionAccessDeniedError, TransactionNotFoundError } from './ledger-errors.js';
import type { ListTransactionsParams, Page } from './ledger-types.js';
import { presentTransaction, type TransactionView } from './transaction-presenter.js';
import type { TransactionRepository } from './transaction-repository.js';

export class TransactionService {
  constructor(private transactionRepo: TransactionRepository) {}

  /**
   * Transactions where the user is sender or receiver, newest first
   */
  async listTransactions(
    userId: string,
    params: ListTransactionsParams
  ): Promise<Page<TransactionView>> {
    const page = await this.transactionRepo.listForUser(userId, params);
    return {
      ...page,
      items: page.items.map((record) => presentTransaction(record, userId)),
    };
  }

  /**
   * @throws TransactionNotFoundError for unknown references
   * @throws TransactionAccessDeniedError when the user is not a party
   */
  async getTransaction(userId: string, reference: string): Promise<TransactionView> {
    const record = await this.transactionRepo.findByReference(reference);
    if (!record) {
      throw new TransactionNotFoundError(reference);
    }
    if (record.senderId !== userId && record.receiverId !== userId) {
      throw new TransactionAccessDeniedError();
    }
    return presentTransaction(record, userId);
  }
}
