/**
 * Transfer fee policy
 *
 * Pure functions; no I/O. A quote is computed once, before the ledger is
 * touched, and the same numbers are written to the transaction record.
 */

import { InvalidAmountError } from '../errors.js';
import { formatMoney } from './money.js';
import type { TransferQuote } from './ledger-types.js';

const BASIS_POINTS = 10_000;

export interface FeePolicyConfig {
  /** Fee rate in basis points (50 = 0.5%) */
  rateBasisPoints: number;
  minAmountMinor: number;
  maxAmountMinor: number;
}

export interface FeePolicy extends Readonly<FeePolicyConfig> {
  quote(amountMinor: number): TransferQuote;
}

export const DEFAULT_FEE_POLICY_CONFIG = {
  rateBasisPoints: 50,
  minAmountMinor: 100, // $1.00
  maxAmountMinor: 1_000_000, // $10,000.00
} as const satisfies FeePolicyConfig;

/**
 * Fee in cents, rounded half-up: floor((amount * rate + 5000) / 10000).
 * Operands stay well inside the safe-integer range for any allowed amount.
 */
export function computeFee(amountMinor: number, rateBasisPoints: number): number {
  return Math.floor((amountMinor * rateBasisPoints + BASIS_POINTS / 2) / BASIS_POINTS);
}

export function createFeePolicy(config: FeePolicyConfig): FeePolicy {
  if (
    !Number.isInteger(config.rateBasisPoints) ||
    config.rateBasisPoints < 0 ||
    !Number.isSafeInteger(config.minAmountMinor) ||
    !Number.isSafeInteger(config.maxAmountMinor) ||
    config.minAmountMinor <= 0 ||
    config.maxAmountMinor < config.minAmountMinor
  ) {
    throw new Error('Invalid fee policy configuration');
  }

  return {
    ...config,
    quote(amountMinor: number): TransferQuote {
      if (!Number.isSafeInteger(amountMinor)) {
        throw new InvalidAmountError('Amount must be a whole number of cents');
      }
      if (amountMinor < config.minAmountMinor) {
        throw new InvalidAmountError(
          `Minimum transfer amount is ${formatMoney(config.minAmountMinor)}`
        );
      }
      if (amountMinor > config.maxAmountMinor) {
        throw new InvalidAmountError(
          `Maximum transfer amount is ${formatMoney(config.maxAmountMinor)}`
        );
      }

      const feeMinor = computeFee(amountMinor, config.rateBasisPoints);
      return {
        amountMinor,
        feeMinor,
        totalMinor: amountMinor + feeMinor,
      };
    },
  };
}

export const defaultFeePolicy = createFeePolicy(DEFAULT_FEE_POLICY_CONFIG);

export function quoteTransfer(amountMinor: number): TransferQuote {
  return defaultFeePolicy.quote(amountMinor);
}
