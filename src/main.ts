// src/main.ts
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';

async function bootstrap(): Promise<void> {
  // CORS is applied by configureApp with our own policy
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    cors: false,
  });

  const cfg = configureApp(app);

  await app.listen(cfg.port, cfg.host);
  Logger.log(`Listening on http://${cfg.host}:${cfg.port}`, 'Bootstrap');
}

bootstrap().catch((err: unknown) => {
  Logger.error(
    err instanceof Error ? (err.stack ?? err.message) : String(err),
    'Bootstrap',
  );
  process.exit(1);
});
