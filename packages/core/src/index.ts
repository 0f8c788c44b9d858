/**
 * @payflow/core - Domain logic for the PayFlow wallet platform
 *
 * Services and repositories for users, profiles, wallets, the transfer
 * ledger, beneficiaries, notifications and admin reporting. The API layer
 * wires them together; nothing in here knows about HTTP.
 */

export * from './errors.js';
export * from './events.js';
export * from './ledger/index.js';
export * from './wallets/index.js';
export * from './users/index.js';
export * from './profiles/index.js';
export * from './beneficiaries/index.js';
export * from './notifications/index.js';
export * from './admin/index.js';
export { isUniqueViolation } from './shared/database-errors.js';
