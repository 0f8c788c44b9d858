import { describe, it, expect } from 'vitest';
import { InvalidAmountError } from '../../errors.js';
import {
  DEFAULT_FEE_POLICY_CONFIG,
  computeFee,
  createFeePolicy,
  quoteTransfer,
} from '../fee-policy.js';

describe('computeFee', () => {
  it.each([
    [100, 1], // 0.5 cent rounds up
    [199, 1],
    [300, 2], // 1.5 cents rounds up
    [1000, 5],
    [3000, 15],
    [5000, 25],
    [10_050, 50], // 50.25 cents rounds down
    [1_000_000, 5000],
  ])('charges %i cents a fee of %i cents at 50 bps', (amount, fee) => {
    expect(computeFee(amount, 50)).toBe(fee);
  });

  it('charges nothing at a zero rate', () => {
    expect(computeFee(123_456, 0)).toBe(0);
  });
});

describe('quoteTransfer', () => {
  it('adds the fee to the amount', () => {
    expect(quoteTransfer(5000)).toEqual({ amountMinor: 5000, feeMinor: 25, totalMinor: 5025 });
  });

  it('accepts both bounds', () => {
    expect(quoteTransfer(100).totalMinor).toBe(101);
    expect(quoteTransfer(1_000_000).totalMinor).toBe(1_005_000);
  });

  it('rejects amounts below the minimum', () => {
    expect(() => quoteTransfer(99)).toThrow(InvalidAmountError);
    expect(() => quoteTransfer(99)).toThrow('Minimum transfer amount is $1.00');
  });

  it('rejects amounts above the maximum', () => {
    expect(() => quoteTransfer(1_000_001)).toThrow('Maximum transfer amount is $10,000.00');
  });

  it('rejects zero, negative and fractional amounts', () => {
    expect(() => quoteTransfer(0)).toThrow(InvalidAmountError);
    expect(() => quoteTransfer(-500)).toThrow(InvalidAmountError);
    expect(() => quoteTransfer(100.5)).toThrow('Amount must be a whole number of cents');
  });
});

describe('createFeePolicy', () => {
  it('exposes its configuration', () => {
    const policy = createFeePolicy({ ...DEFAULT_FEE_POLICY_CONFIG, rateBasisPoints: 100 });
    expect(policy.rateBasisPoints).toBe(100);
    expect(policy.quote(5000)).toEqual({ amountMinor: 5000, feeMinor: 50, totalMinor: 5050 });
  });

  it('rejects inconsistent bounds', () => {
    expect(() =>
      createFeePolicy({ rateBasisPoints: 50, minAmountMinor: 500, maxAmountMinor: 100 })
    ).toThrow('Invalid fee policy configuration');
  });
});
