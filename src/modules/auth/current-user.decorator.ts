import { createParamDecorator, ExecutionContext, UnauthorizedException } from '@nestjs/common';

import type { AuthenticatedRequest } from './authenticated-request';

/** The authenticated user id (the token's `sub`). */
export const CurrentUserId = createParamDecorator((_data: unknown, ctx: ExecutionContext): string => {
  const request = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
  if (!request.actorId) {
    throw new UnauthorizedException('Missing bearer token.');
  }
  return request.actorId;
});
