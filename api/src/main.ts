import 'reflect-metadata';

import { NestFactory } from '@nestjs/core';
import { Logger, type LogLevel } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { NestExpressApplication } from '@nestjs/platform-express';
import type { Env } from '@swissrpg-bot/contract';
import compression from 'compression';
import helmet from 'helmet';
import { AppModule } from './app.module';
import { staticAssetsDir } from './deploy/deploy-options';
import { ThrottlerExceptionFilter } from './throttler/throttler-exception.filter';

async function bootstrap() {
  const isDebug = process.env.DEBUG === 'true';
  const logLevels: LogLevel[] = isDebug
    ? ['error', 'warn', 'log', 'debug', 'verbose']
    : ['error', 'warn', 'log'];

  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    logger: logLevels,
  });
  const config = app.get<ConfigService<Env, true>>(ConfigService);
  const isProduction = config.get('NODE_ENV', { infer: true }) === 'production';

  // Security headers (X-Content-Type-Options, X-Frame-Options, HSTS, etc.)
  app.use(helmet());

  // Compress responses > 1KB
  app.use(compression({ threshold: 1024 }));

  // nginx is the only client; X-Real-IP and X-Forwarded-* come from it
  app.getHttpAdapter().getInstance().set('trust proxy', 'loopback');

  // In production nginx serves /static/ from disk
  if (!isProduction) {
    app.useStaticAssets(staticAssetsDir(process.cwd()), {
      prefix: '/static/',
    });
  }

  app.useGlobalFilters(new ThrottlerExceptionFilter());

  // Disconnect from Discord and Redis on SIGTERM from systemd
  app.enableShutdownHooks();

  await app.listen(
    config.get('PORT', { infer: true }),
    config.get('HOST', { infer: true }),
  );
}
bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    'Startup failed:',
    error instanceof Error ? error.stack : error,
  );
  process.exit(1);
});
