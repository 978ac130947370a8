/**
 * Domain error taxonomy.
 *
 * Services throw these instead of Nest HTTP exceptions so the same failure
 * reads the same whether it surfaces over HTTP or inside a transaction.
 * ApiExceptionFilter maps each `code` to an HTTP status.
 */

export type DomainErrorCode =
  | 'invalidValue'
  | 'uniqueness'
  | 'uniquenessRace'
  | 'provisioningFailed'
  | 'cleanupFailed'
  | 'notFound'
  | 'forbidden';

export abstract class DomainError extends Error {
  abstract readonly code: DomainErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed or missing input. Never retried. */
export class ValidationError extends DomainError {
  readonly code = 'invalidValue' as const;
}

/** A uniqueness rule was violated and the caller can see why (pre-insert check). */
export class ConflictError extends DomainError {
  readonly code = 'uniqueness' as const;
}

/**
 * A unique constraint fired at insert time: a concurrent writer claimed the
 * same key between our existence check and our insert.
 */
export class UniquenessRaceError extends DomainError {
  readonly code = 'uniquenessRace' as const;

  constructor(
    readonly constraint: string,
    options?: { cause?: unknown },
  ) {
    super(`unique constraint "${constraint}" violated`, options);
  }
}

/** Provisioning gave up after its retry budget. */
export class ProvisioningError extends DomainError {
  readonly code = 'provisioningFailed' as const;

  constructor(
    message: string,
    readonly attempts: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Compensating cleanup failed. Logged only. */
export class CleanupError extends DomainError {
  readonly code = 'cleanupFailed' as const;
}

export class NotFoundError extends DomainError {
  readonly code = 'notFound' as const;
}

export class ForbiddenError extends DomainError {
  readonly code = 'forbidden' as const;
}
