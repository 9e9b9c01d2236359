import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { loadConfiguration } from './config/configuration';
import { HealthModule } from './health/health.module';
import { AuthModule } from './auth/auth.module';
import { OcrModule } from './ocr/ocr.module';
import { AppController } from './app.controller';

@Module({
  imports: [
    // ── Configuration ─────────────────────────────────────
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env'],
      load: [() => loadConfiguration()],
    }),

    // ── Feature Modules ───────────────────────────────────
    HealthModule,
    AuthModule,
    OcrModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
