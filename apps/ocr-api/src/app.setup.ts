import { INestApplication, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfiguration } from './config/configuration.interface';
import { ApiExceptionFilter } from './common/filters/api-exception.filter';

/**
 * Global pipes, filters and CORS. Shared by main.ts and the e2e suite so
 * both serve the same HTTP surface.
 */
export function configureApp(app: INestApplication): void {
  const configService = app.get<ConfigService<AppConfiguration, true>>(ConfigService);

  // ── Global Pipes ──────────────────────────────────────
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  // ── Global Filters ────────────────────────────────────
  app.useGlobalFilters(new ApiExceptionFilter());

  // ── CORS ──────────────────────────────────────────────
  const { origins } = configService.get('cors', { infer: true });
  const anyOrigin = origins.includes('*');
  app.enableCors({
    origin: anyOrigin ? '*' : origins,
    credentials: !anyOrigin,
  });
}
