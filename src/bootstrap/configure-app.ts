import { ValidationPipe } from '@nestjs/common';
import type { NestExpressApplication } from '@nestjs/platform-express';

export const DEFAULT_API_PREFIX = 'api';

/**
 * Middleware stack shared by main.ts and the e2e harness.
 * @returns the global route prefix
 */
export function configureApp(app: NestExpressApplication): string {
  // Trust reverse proxy so req.ip reflects the original client
  app.set('trust proxy', true);

  const globalPrefix = process.env.API_PREFIX || DEFAULT_API_PREFIX;
  app.setGlobalPrefix(globalPrefix);

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: false,
      transform: true,
      transformOptions: { enableImplicitConversion: true }
    })
  );
  return globalPrefix;
}
