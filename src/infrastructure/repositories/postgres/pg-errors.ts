import { UniquenessRaceError } from '../../../domain/errors/domain.errors';

/** SQLSTATE for unique_violation. */
export const UNIQUE_VIOLATION = '23505';

export interface PgUniqueViolation {
  code: typeof UNIQUE_VIOLATION;
  constraint?: string;
}

export function isUniqueViolation(error: unknown): error is PgUniqueViolation {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === UNIQUE_VIOLATION
  );
}

/**
 * Translate a pg driver error into the domain vocabulary. Unique violations
 * become UniquenessRaceError; anything else is returned untouched.
 */
export function translatePgError(error: unknown): unknown {
  if (isUniqueViolation(error)) {
    return new UniquenessRaceError(error.constraint ?? 'unknown', { cause: error });
  }
  return error;
}
