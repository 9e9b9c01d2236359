import {
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  UploadedFile,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { CurrentUser, JwtAuthGuard } from '../auth';
import type { RequestUser } from '../auth';
import { OcrResultDto, OcrStatusDto } from './dto';
import { OcrQueryService } from './ocr-query.service';
import { OcrUploadService } from './ocr-upload.service';

/**
 * REST controller for OCR jobs.
 *
 * Routes:
 *   POST /ocr/upload         upload a document and queue it
 *   GET  /ocr/status/:jobId  current status of one of the caller's jobs
 *   GET  /ocr/result/:jobId  extracted text of a completed job
 *
 * All routes require a valid JWT access token (Authorization: Bearer <token>).
 * Multer options (memory storage, byte limit) come from OcrModule.
 */
@Controller('ocr')
@UseGuards(JwtAuthGuard)
export class OcrController {
  constructor(
    private readonly uploadService: OcrUploadService,
    private readonly queryService: OcrQueryService,
  ) {}

  /**
   * Error responses:
   *   400  no file, or unsupported extension
   *   401  missing or invalid JWT
   *   413  file exceeds the size limit
   *   503  processing queue is full
   */
  @Post('upload')
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(FileInterceptor('file'))
  async upload(
    @UploadedFile() file: Express.Multer.File | undefined,
    @CurrentUser() user: RequestUser,
  ): Promise<OcrStatusDto> {
    return this.uploadService.upload(file, user.username);
  }

  @Get('status/:jobId')
  status(@Param('jobId') jobId: string, @CurrentUser() user: RequestUser): OcrStatusDto {
    return this.queryService.getStatus(jobId, user.username);
  }

  @Get('result/:jobId')
  result(@Param('jobId') jobId: string, @CurrentUser() user: RequestUser): OcrResultDto {
    return this.queryService.getResult(jobId, user.username);
  }
}
