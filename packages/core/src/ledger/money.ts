import { InvalidAmountError } from '../errors.js';

/**
 * Money is handled as integer minor units (cents) everywhere below the HTTP
 * layer. These helpers are the only place decimals are parsed or produced.
 */

const DECIMAL_AMOUNT = /^(-?)(\d+)(?:\.(\d{1,2}))?$/;

export const MINOR_UNITS_PER_MAJOR = 100;
export const DEFAULT_CURRENCY = 'USD';

/**
 * Converts a client-supplied amount ("49.75" or 49.75) into cents.
 * More than two decimal places, exponents and non-finite values are rejected.
 */
export function toMinorUnits(amount: number | string): number {
  const text = typeof amount === 'number' ? String(amount) : amount.trim();
  const match = DECIMAL_AMOUNT.exec(text);
  if (!match) {
    throw new InvalidAmountError(`Invalid amount: ${text}`);
  }

  const [, sign, whole = '0', fraction = ''] = match;
  const minor = Number(whole) * MINOR_UNITS_PER_MAJOR + Number(fraction.padEnd(2, '0'));
  if (!Number.isSafeInteger(minor)) {
    throw new InvalidAmountError(`Amount is too large: ${text}`);
  }

  return sign === '-' ? -minor : minor;
}

export function toMajorUnits(minor: number): number {
  return minor / MINOR_UNITS_PER_MAJOR;
}

const formatters = new Map<string, Intl.NumberFormat>();

/** `formatMoney(4975)` → `$49.75` */
export function formatMoney(minor: number, currency: string = DEFAULT_CURRENCY): string {
  let formatter = formatters.get(currency);
  if (!formatter) {
    formatter = new Intl.NumberFormat('en-US', { style: 'currency', currency });
    formatters.set(currency, formatter);
  }
  return formatter.format(toMajorUnits(minor));
}
