import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { OCR_PIPELINE } from './interfaces/ocr-pipeline.interface';
import type { OcrPipeline, PipelineSettings } from './interfaces/ocr-pipeline.interface';
import { SubprocessOcrPipeline } from './subprocess-ocr-pipeline';

/**
 * Binds OCR_PIPELINE to the subprocess adapter.
 *
 * Usage:
 *   PipelineModule.forRoot()  reads the `pipeline` configuration section
 *
 * Tests swap the implementation with
 * `overrideProvider(OCR_PIPELINE).useValue(fake)`.
 */
@Module({})
export class PipelineModule {
  static forRoot(): DynamicModule {
    const pipelineProvider = {
      provide: OCR_PIPELINE,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): OcrPipeline => {
        const settings = configService.getOrThrow<PipelineSettings>('pipeline');
        return new SubprocessOcrPipeline(settings);
      },
    };

    return {
      module: PipelineModule,
      imports: [ConfigModule],
      providers: [pipelineProvider],
      exports: [OCR_PIPELINE],
      global: false,
    };
  }
}
