import type { INestApplication } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import type { NestExpressApplication } from '@nestjs/platform-express';

import { configureApp } from '@app/bootstrap/configure-app';

/** Secret the e2e app signs tokens with. */
export const E2E_JWT_SECRET = 'test-secret';

/**
 * Bootstraps a full NestJS application for E2E testing.
 *
 * - Runs on the in-memory persistence backend (no database)
 * - Signs tokens with a known secret and disables provisioning backoff
 * - Applies the same middleware stack as production (global prefix, validation)
 *
 * Call `app.close()` in your `afterAll()` to shut down cleanly.
 */
export async function createTestApp(env: Record<string, string> = {}): Promise<INestApplication> {
  Object.assign(process.env, {
    NODE_ENV: 'test',
    PERSISTENCE_BACKEND: 'inmemory',
    JWT_SECRET: E2E_JWT_SECRET,
    PROVISIONING_BACKOFF_UNIT_MS: '0',
    LOG_LEVEL: 'OFF',
    API_PREFIX: 'api',
    ...env,
  });

  // RepositoryModule picks its backend when AppModule is evaluated, so load it after the env is set
  const { AppModule } = await import('@app/modules/app/app.module');

  const moduleFixture = await Test.createTestingModule({
    imports: [AppModule],
  }).compile();

  const app = moduleFixture.createNestApplication<NestExpressApplication>({ logger: false });
  configureApp(app);

  await app.init();
  return app;
}
