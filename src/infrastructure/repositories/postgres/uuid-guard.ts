/**
 * UUID format guard for PostgreSQL repositories.
 *
 * PostgreSQL UUID columns reject non-UUID strings with
 * "invalid input syntax for type uuid" (SQLSTATE 22P02). Look-ups such as
 * `findById('not-a-uuid')` should simply miss, so callers short-circuit
 * with this guard instead of making a round-trip that would throw.
 */

const UUID_RE =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[1-7][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

/** Returns `true` when `value` is a well-formed UUID v1-v7 string. */
export function isValidUuid(value: string): boolean {
  return UUID_RE.test(value);
}
