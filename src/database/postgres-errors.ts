const UNIQUE_VIOLATION = '23505';

/**
 * SQLSTATE of a driver error. drizzle wraps driver failures, so the code may
 * sit on a `cause` further down the chain.
 */
export function postgresErrorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('code' in error && typeof error.code === 'string') return error.code;
  if ('cause' in error) return postgresErrorCode(error.cause);
  return undefined;
}

export function isUniqueViolation(error: unknown): boolean {
  return postgresErrorCode(error) === UNIQUE_VIOLATION;
}
