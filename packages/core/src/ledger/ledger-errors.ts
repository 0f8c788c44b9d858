/**
 * Ledger Domain Errors
 *
 * InvalidAmountError, SelfTransferError and InsufficientFundsError live in
 * the shared taxonomy (../errors.ts) since wallets raise them too.
 */

import { ForbiddenError, NotFoundError } from '../errors.js';

export class ReceiverNotFoundError extends NotFoundError {
  constructor(message = 'Receiver not found or wallet is inactive') {
    super(message);
  }
}

export class WalletNotFoundError extends NotFoundError {
  constructor(userId: string) {
    super(`Wallet not found for user: ${userId}`);
  }
}

export class WalletInactiveError extends ForbiddenError {
  constructor(message = 'Wallet is frozen') {
    super(message);
  }
}

export class TransactionNotFoundError extends NotFoundError {
  constructor(reference: string) {
    super(`Transaction not found: ${reference}`);
  }
}

export class TransactionAccessDeniedError extends ForbiddenError {
  constructor() {
    super('You are not a party to this transaction');
  }
}
