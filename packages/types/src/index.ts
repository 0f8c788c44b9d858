export * from './common.schema.js';
export * from './auth.schema.js';
export * from './user.schema.js';
export * from './wallet.schema.js';
export * from './transaction.schema.js';
export * from './beneficiary.schema.js';
export * from './notification.schema.js';
export * from './admin.schema.js';
