import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, RequestMethod, ValidationPipe } from '@nestjs/common';
import helmet from 'helmet';
import { JsonLoggerService } from '@gemhouse/shared';
import { AppModule } from './app.module';
import { PLACEHOLDER_JWT_SECRET } from './config/env.validation';

async function bootstrap() {
  const jsonLogger = new JsonLoggerService('auction-service');
  const logger = new Logger('Bootstrap');

  // ── Startup sanity checks ────────────────────────────────────
  const nodeEnv = process.env.NODE_ENV;
  const corsOrigin = process.env.CORS_ORIGIN;

  if (nodeEnv === 'production' && process.env.JWT_SECRET === PLACEHOLDER_JWT_SECRET) {
    jsonLogger.fatal(
      'FATAL: JWT_SECRET is set to the default value in production. Refusing to start.',
      'Bootstrap',
    );
    process.exit(1);
  }

  if (nodeEnv === 'production' && (!corsOrigin || corsOrigin === '*')) {
    jsonLogger.fatal(
      'FATAL: CORS_ORIGIN must be set to a specific origin in production (not wildcard). Refusing to start.',
      'Bootstrap',
    );
    process.exit(1);
  }

  const app = await NestFactory.create(AppModule, { logger: jsonLogger });

  app.use(helmet());
  app.setGlobalPrefix('api/v1', {
    exclude: [
      { path: 'metrics', method: RequestMethod.GET },
      { path: 'health', method: RequestMethod.GET },
    ],
  });
  app.useGlobalPipes(new ValidationPipe({ transform: true, whitelist: true }));
  app.enableCors({ origin: corsOrigin || '*' });
  app.enableShutdownHooks();

  const port = process.env.PORT || 3000;
  await app.listen(port);
  logger.log(`Auction service running on port ${port}`);
}

bootstrap().catch((err: unknown) => {
  new JsonLoggerService('auction-service').fatal(
    `Bootstrap failed: ${err instanceof Error ? err.message : String(err)}`,
    'Bootstrap',
  );
  process.exit(1);
});
