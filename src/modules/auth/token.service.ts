import { Inject, Injectable, UnauthorizedException } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';

import { AppLogger } from '../logging/app-logger.service';
import { LogCategory } from '../logging/log-levels';

export const TOKEN_EXPIRES_IN = 'TOKEN_EXPIRES_IN';
export const DEFAULT_TOKEN_EXPIRES_IN = 3600;

export interface AccessToken {
  accessToken: string;
  expiresIn: number;
}

export interface TokenPayload {
  sub: string;
  token_type: string;
}

function isTokenPayload(value: unknown): value is TokenPayload {
  return (
    typeof value === 'object' &&
    value !== null &&
    'sub' in value &&
    typeof value.sub === 'string' &&
    'token_type' in value &&
    value.token_type === 'access_token'
  );
}

/** Lifetime in seconds from JWT_EXPIRES_IN; invalid values fall back to an hour. */
export function parseExpiresIn(raw: string | undefined): number {
  const value = Number(raw);
  return raw && Number.isInteger(value) && value > 0 ? value : DEFAULT_TOKEN_EXPIRES_IN;
}

@Injectable()
export class TokenService {
  constructor(
    private readonly jwtService: JwtService,
    @Inject(TOKEN_EXPIRES_IN) private readonly expiresIn: number,
    private readonly logger: AppLogger,
  ) {}

  issue(userId: string): AccessToken {
    const payload: TokenPayload = { sub: userId, token_type: 'access_token' };
    const accessToken = this.jwtService.sign(payload, { expiresIn: `${this.expiresIn}s` });

    this.logger.debug(LogCategory.AUTH, 'Access token issued', { userId, expiresIn: this.expiresIn });
    return { accessToken, expiresIn: this.expiresIn };
  }

  /** Resolve the user id carried by a token; throws 401 when it is invalid or expired. */
  verify(token: string): string {
    let payload: unknown;
    try {
      payload = this.jwtService.verify<Record<string, unknown>>(token);
    } catch (error) {
      this.logger.debug(LogCategory.AUTH, 'Token validation failed', {
        reason: error instanceof Error ? error.message : String(error),
      });
      throw new UnauthorizedException('Invalid or expired token.');
    }

    if (!isTokenPayload(payload)) {
      this.logger.debug(LogCategory.AUTH, 'Token payload rejected');
      throw new UnauthorizedException('Invalid or expired token.');
    }
    return payload.sub;
  }
}
