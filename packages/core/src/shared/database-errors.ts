/**
 * Postgres reports unique violations as SQLSTATE 23505. Drizzle passes the
 * driver error through, sometimes as the `cause` of a wrapper.
 */
export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if ('code' in error && error.code === '23505') {
    return true;
  }
  return error.cause !== undefined && isUniqueViolation(error.cause);
}
