import { isUniqueViolation, translatePgError, UNIQUE_VIOLATION } from './pg-errors';
import { UniquenessRaceError } from '../../../domain/errors/domain.errors';

describe('pg-errors', () => {
  describe('isUniqueViolation', () => {
    it('should recognise SQLSTATE 23505', () => {
      expect(isUniqueViolation({ code: UNIQUE_VIOLATION, constraint: 'profiles_pkey' })).toBe(true);
    });

    it('should ignore other codes and non-objects', () => {
      expect(isUniqueViolation({ code: '23503' })).toBe(false);
      expect(isUniqueViolation('23505')).toBe(false);
      expect(isUniqueViolation(null)).toBe(false);
    });
  });

  describe('translatePgError', () => {
    it('should turn a unique violation into UniquenessRaceError carrying the constraint', () => {
      const driverError = { code: '23505', constraint: 'profiles_username_lower_key' };

      const translated = translatePgError(driverError);

      expect(translated).toBeInstanceOf(UniquenessRaceError);
      expect(translated).toMatchObject({
        constraint: 'profiles_username_lower_key',
        message: 'unique constraint "profiles_username_lower_key" violated',
        cause: driverError,
      });
    });

    it('should fall back to "unknown" when the driver omits the constraint', () => {
      expect(translatePgError({ code: '23505' })).toMatchObject({ constraint: 'unknown' });
    });

    it('should return other errors untouched', () => {
      const error = new Error('connection refused');
      expect(translatePgError(error)).toBe(error);
    });
  });
});
