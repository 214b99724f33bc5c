import { QueryFailedError } from 'typeorm';

const UNIQUE_VIOLATION_CODES = new Set([
  'ER_DUP_ENTRY', // mysql
  'SQLITE_CONSTRAINT_UNIQUE',
  '23505', // postgres
]);

/** True when the error is the database rejecting a duplicate key. */
export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) return false;
  const driverError: unknown = error.driverError;
  if (typeof driverError !== 'object' || driverError === null) return false;
  const code: unknown = 'code' in driverError ? driverError.code : undefined;
  return typeof code === 'string' && UNIQUE_VIOLATION_CODES.has(code);
}
