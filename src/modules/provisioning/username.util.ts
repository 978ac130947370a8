import { ValidationError } from '../../domain/errors/domain.errors';

export const USERNAME_PATTERN = /^[A-Za-z0-9_-]{3,20}$/;

export const AVATAR_PLACEHOLDER_BASE = 'https://ui-avatars.com/api/';

/**
 * Trim and validate a username taken from untrusted input.
 * Non-string values count as missing.
 */
export function validateUsername(raw: unknown): string {
  const username = typeof raw === 'string' ? raw.trim() : '';
  if (username === '') {
    throw new ValidationError('username required');
  }
  if (!USERNAME_PATTERN.test(username)) {
    throw new ValidationError('invalid username format');
  }
  return username;
}

/** The supplied avatar URL when non-blank, otherwise a placeholder derived from the username. */
export function resolveAvatarUrl(username: string, raw?: unknown): string {
  const supplied = typeof raw === 'string' ? raw.trim() : '';
  if (supplied !== '') return supplied;
  return `${AVATAR_PLACEHOLDER_BASE}?name=${encodeURIComponent(username)}&background=random`;
}
