// src/app.setup.ts
import type { NestExpressApplication } from '@nestjs/platform-express';
import { APP_CONFIG, type AppConfig } from './config/app.config';

type CorsOriginCallback = (err: Error | null, allow?: boolean) => void;

// http(s)://localhost:<any>, http(s)://127.0.0.1:<any>, http(s)://[::1]:<any>
const localhostOrigin = /^https?:\/\/(localhost|\[::1\]|127\.0\.0\.1)(:\d+)?$/;

/**
 * Apply runtime wiring shared by main.ts and the e2e suites:
 * CORS policy, dashboard assets and shutdown hooks.
 */
export function configureApp(app: NestExpressApplication): AppConfig {
  const cfg = app.get<AppConfig>(APP_CONFIG);

  app.enableCors({
    origin(origin: string | undefined, cb: CorsOriginCallback): void {
      // Same-origin dashboard calls and curl carry no Origin
      if (origin == null) {
        cb(null, true);
        return;
      }
      if (localhostOrigin.test(origin)) {
        cb(null, true);
        return;
      }
      // Still served; only the CORS headers are withheld
      cb(null, false);
    },
    methods: ['GET', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
    credentials: false,
    maxAge: 86_400,
  });

  app.useStaticAssets(cfg.publicDir, { prefix: '/static/' });
  app.enableShutdownHooks();

  return cfg;
}
