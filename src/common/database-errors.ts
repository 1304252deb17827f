import { QueryFailedError } from 'typeorm';

// postgres, better-sqlite3, sqlite3
const UNIQUE_VIOLATION_CODES: ReadonlySet<string> = new Set([
  '23505',
  'SQLITE_CONSTRAINT_UNIQUE',
  'SQLITE_CONSTRAINT',
]);

export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) return false;
  const driverError: unknown = error.driverError;
  if (
    typeof driverError !== 'object' ||
    driverError === null ||
    !('code' in driverError)
  ) {
    return false;
  }
  return (
    typeof driverError.code === 'string' &&
    UNIQUE_VIOLATION_CODES.has(driverError.code)
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
