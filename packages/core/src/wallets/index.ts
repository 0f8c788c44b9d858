/**
 * Wallets Domain
 */

export { DrizzleWalletRepository } from './wallet-repository.js';
export type { WalletRepository } from './wallet-repository.js';

export { MAX_FUNDING_AMOUNT_MINOR, WalletService } from './wallet-service.js';
export type { AddFundsResult } from './wallet-service.js';

export { presentWallet } from './wallet-presenter.js';
export type { WalletView } from './wallet-presenter.js';
