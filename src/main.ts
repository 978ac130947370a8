import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';

import { AppModule } from './modules/app/app.module';
import { configureApp } from './bootstrap/configure-app';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bufferLogs: true
  });

  // Fire OnModuleDestroy (pg pool shutdown) on SIGTERM/SIGINT
  app.enableShutdownHooks();
  app.useLogger(new Logger('RoomcastApi'));

  const globalPrefix = configureApp(app);

  const port = Number(process.env.PORT ?? 3000);
  await app.listen(port);
  Logger.log(`Roomcast API is running on http://localhost:${port}/${globalPrefix}`);
}

void bootstrap();
