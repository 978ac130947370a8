import { Logger, Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { JwtModule } from '@nestjs/jwt';
import { ConfigModule, ConfigService } from '@nestjs/config';
import * as crypto from 'node:crypto';

import { BearerAuthGuard } from './bearer-auth.guard';
import { TOKEN_EXPIRES_IN, TokenService, parseExpiresIn } from './token.service';

export const TOKEN_ISSUER = 'roomcast-api';

@Module({
  imports: [
    ConfigModule,
    JwtModule.registerAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (config: ConfigService) => {
        const secret = config.get<string>('JWT_SECRET');

        if (!secret) {
          if (process.env.NODE_ENV === 'production') {
            throw new Error('JWT_SECRET is required in production to sign access tokens.');
          }

          const generated = crypto.randomBytes(32).toString('hex');
          new Logger('AuthModule').warn(
            'Using development-only JWT secret (auto-generated). Configure JWT_SECRET for production.',
          );

          return {
            secret: generated,
            signOptions: { issuer: TOKEN_ISSUER },
            verifyOptions: { issuer: TOKEN_ISSUER },
          };
        }

        return {
          secret,
          signOptions: { issuer: TOKEN_ISSUER },
          verifyOptions: { issuer: TOKEN_ISSUER },
        };
      },
    }),
  ],
  providers: [
    {
      provide: TOKEN_EXPIRES_IN,
      inject: [ConfigService],
      useFactory: (config: ConfigService) => parseExpiresIn(config.get<string>('JWT_EXPIRES_IN')),
    },
    TokenService,
    {
      provide: APP_GUARD,
      useClass: BearerAuthGuard,
    },
  ],
  exports: [TokenService],
})
export class AuthModule {}
