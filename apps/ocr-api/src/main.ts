import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { DEFAULT_SECRET_KEY } from './config/configuration';
import type { AppConfiguration } from './config/configuration.interface';
import { resolveLogLevels } from './config/log-levels';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule, {
    bufferLogs: true,
    abortOnError: false,
  });

  const configService = app.get<ConfigService<AppConfiguration, true>>(ConfigService);
  const { host, port, debug, title, version } = configService.get('app', { infer: true });

  // ── Logging ───────────────────────────────────────────
  app.useLogger(resolveLogLevels(configService.get('logging', { infer: true }).level, debug));

  configureApp(app);
  app.enableShutdownHooks();

  if (configService.get('security', { infer: true }).secretKey === DEFAULT_SECRET_KEY) {
    logger.warn('SECRET_KEY is the built-in placeholder; set a real secret before deploying');
  }

  // ── Start ─────────────────────────────────────────────
  await app.listen(port, host);

  logger.log(`${title} ${version} running on http://${host}:${port}`);
}

bootstrap().catch((err: unknown) => {
  const message = err instanceof Error ? (err.stack ?? err.message) : String(err);
  Logger.flush();
  new Logger('Bootstrap').fatal(`Failed to start: ${message}`);
  process.exitCode = 1;
});
