import type { Request } from 'express';

/** Request after the bearer guard has resolved the caller. */
export interface AuthenticatedRequest extends Request {
  actorId?: string;
}
