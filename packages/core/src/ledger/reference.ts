import { randomBytes } from 'node:crypto';

export type ReferencePrefix = 'WAL' | 'TXN' | 'DEP';

/**
 * Public identifiers for wallets and transactions: prefix, base36 timestamp,
 * then 48 random bits in hex. Uniqueness is still enforced by the database.
 */
export function generateReference(prefix: ReferencePrefix): string {
  const time = Date.now().toString(36).toUpperCase();
  const random = randomBytes(6).toString('hex').toUpperCase();
  return `${prefix}${time}${random}`;
}
