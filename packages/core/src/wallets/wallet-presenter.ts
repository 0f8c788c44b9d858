import type { Wallet, WalletStatus } from '@payflow/database';
import { toMajorUnits } from '../ledger/money.js';

export interface WalletView {
  id: string;
  walletNumber: string;
  balance: number;
  currency: string;
  status: WalletStatus;
  createdAt: string;
  updatedAt: string;
}

export function presentWallet(wallet: Wallet): WalletView {
  return {
    id: wallet.id,
    walletNumber: wallet.walletNumber,
    balance: toMajorUnits(wallet.balanceMinor),
    currency: wallet.currency,
    status: wallet.status,
    createdAt: wallet.createdAt.toISOString(),
    updatedAt: wallet.updatedAt.toISOString(),
  };
}
