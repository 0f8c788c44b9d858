import { readFile } from 'node:fs/promises';

const SCHEMA_SQL_URL = new URL('../sql/schema.sql', import.meta.url);

/** Idempotent DDL for every table, applied by the bootstrap script. */
export function readSchemaSql(): Promise<string> {
  return readFile(SCHEMA_SQL_URL, 'utf8');
}
