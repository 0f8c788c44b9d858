export * from './schema.js';
export {
  createDatabase,
  type CreateDatabaseOptions,
  type Database,
  type DatabaseHandle,
  type DatabaseOrTransaction,
  type DatabaseTransaction,
} from './client.js';
export { readSchemaSql } from './schema-sql.js';
