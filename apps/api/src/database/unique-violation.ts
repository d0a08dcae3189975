import { QueryFailedError } from 'typeorm';

// PostgreSQL unique_violation, SQLite constraint codes (better-sqlite3)
const UNIQUE_VIOLATION_CODES = new Set([
  '23505',
  'SQLITE_CONSTRAINT_UNIQUE',
  'SQLITE_CONSTRAINT_PRIMARYKEY',
]);

export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) {
    return false;
  }
  const driverError: unknown = error.driverError;
  if (typeof driverError !== 'object' || driverError === null || !('code' in driverError)) {
    return false;
  }
  return typeof driverError.code === 'string' && UNIQUE_VIOLATION_CODES.has(driverError.code);
}
