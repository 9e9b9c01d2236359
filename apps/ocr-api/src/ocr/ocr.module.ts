import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { MulterModule } from '@nestjs/platform-express';
import { memoryStorage } from 'multer';
import { JobsModule } from '@ocr-gateway/jobs';
import { AuthModule } from '../auth';
import type { AppConfiguration } from '../config/configuration.interface';
import { ProcessingModule } from '../processing/processing.module';
import { WorkspaceModule } from '../workspace/workspace.module';
import { OcrController } from './ocr.controller';
import { OcrQueryService } from './ocr-query.service';
import { OcrUploadService } from './ocr-upload.service';
import { multerFileSizeLimit } from './upload-limits';

/**
 * Upload and query routes.
 *
 * Uploads stay in memory. Multer stops reading a stream just past the
 * configured limit, and OcrUploadService answers a file that is only
 * slightly over with its own 413.
 */
@Module({
  imports: [
    ConfigModule,
    AuthModule,
    JobsModule,
    WorkspaceModule,
    ProcessingModule,
    MulterModule.registerAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfiguration, true>) => ({
        storage: memoryStorage(),
        limits: {
          fileSize: multerFileSizeLimit(configService.get('upload', { infer: true })),
          files: 1,
        },
      }),
    }),
  ],
  controllers: [OcrController],
  providers: [OcrUploadService, OcrQueryService],
})
export class OcrModule {}
