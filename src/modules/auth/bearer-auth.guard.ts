import {
  CanActivate,
  ExecutionContext,
  Injectable,
  UnauthorizedException
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import type { Response } from 'express';

import { IS_PUBLIC_KEY } from './public.decorator';
import type { AuthenticatedRequest } from './authenticated-request';
import { TokenService } from './token.service';
import { AppLogger } from '../logging/app-logger.service';
import { LogCategory } from '../logging/log-levels';

/**
 * Global guard: every route needs `Authorization: Bearer <jwt>` unless it is
 * marked @Public(). The token's subject becomes the request's actor.
 */
@Injectable()
export class BearerAuthGuard implements CanActivate {
  constructor(
    private readonly tokenService: TokenService,
    private readonly reflector: Reflector,
    private readonly logger: AppLogger,
  ) {}

  canActivate(context: ExecutionContext): boolean {
    const isPublic = this.reflector.getAllAndOverride<boolean>(IS_PUBLIC_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);

    if (isPublic) {
      this.logger.trace(LogCategory.AUTH, 'Skipping auth – route is public');
      return true;
    }

    const httpContext = context.switchToHttp();
    const request = httpContext.getRequest<AuthenticatedRequest>();
    const response = httpContext.getResponse<Response>();
    const header = request.headers.authorization;

    if (!header || !header.startsWith('Bearer ')) {
      this.logger.warn(LogCategory.AUTH, 'Missing or malformed Authorization header');
      return this.reject(response, 'Missing bearer token.');
    }

    try {
      request.actorId = this.tokenService.verify(header.slice(7));
    } catch {
      this.logger.warn(LogCategory.AUTH, 'Authentication failed – invalid bearer token');
      return this.reject(response, 'Invalid or expired token.');
    }

    this.logger.enrichContext({ userId: request.actorId });
    this.logger.debug(LogCategory.AUTH, 'Bearer token accepted');
    return true;
  }

  private reject(response: Response, detail: string): never {
    response.setHeader('WWW-Authenticate', 'Bearer realm="roomcast"');
    throw new UnauthorizedException(detail);
  }
}
