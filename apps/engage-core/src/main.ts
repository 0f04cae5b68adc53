import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe, ConsoleLogger, Logger, LogLevel } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { AppConfig } from './common/config/app.config';

/**
 * Get log levels based on LOG_LEVEL environment variable
 * LOG_LEVEL=debug includes: debug, log, warn, error
 * LOG_LEVEL=verbose includes: verbose, debug, log, warn, error
 */
function getLogLevels(): LogLevel[] {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  switch (level) {
    case 'verbose':
      return ['verbose', 'debug', 'log', 'warn', 'error'];
    case 'debug':
      return ['debug', 'log', 'warn', 'error'];
    case 'warn':
      return ['warn', 'error'];
    case 'error':
      return ['error'];
    default:
      return ['log', 'warn', 'error'];
  }
}

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    logger: new ConsoleLogger({
      json: process.env.NODE_ENV === 'production',
      colors: process.env.NODE_ENV !== 'production',
      logLevels: getLogLevels(),
    }),
  });

  // Scheduler drains on shutdown (SIGTERM / SIGINT)
  app.enableShutdownHooks();

  const appConfig = app.get(ConfigService).get<AppConfig>('app');
  const port = appConfig?.port ?? 3000;
  const apiPrefix = appConfig?.apiPrefix ?? '/api/v1';

  // Global validation pipe
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  // API prefix
  app.setGlobalPrefix(apiPrefix);

  app.enableCors({
    origin: appConfig?.corsOrigins,
    methods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-API-Key'],
  });

  await app.listen(port);

  Logger.log(`EngageSphere running on http://localhost:${port}${apiPrefix}`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  Logger.error(error instanceof Error ? error.stack : String(error), 'Bootstrap');
  process.exit(1);
});
