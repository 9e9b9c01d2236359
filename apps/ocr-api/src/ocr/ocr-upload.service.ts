import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';
import { JobRegistry } from '@ocr-gateway/jobs';
import type { AppConfiguration, UploadSettings } from '../config/configuration.interface';
import { WorkspaceService } from '../workspace/workspace.service';
import { errorMessage } from '../common/errors/error-details';
import { JobDispatcherService } from '../processing/job-dispatcher.service';
import { QueueFullException } from '../processing/exceptions/queue-full.exception';
import { OcrStatusDto, toOcrStatusDto } from './dto';
import {
  FileTooLargeException,
  MissingFileException,
  UnsupportedFileTypeException,
  UploadPersistenceException,
} from './exceptions/ocr.exceptions';
import { hasAllowedExtension, maxUploadBytes } from './upload-limits';

/**
 * OcrUploadService — accepts a file and turns it into a queued job.
 *
 * Happy path:
 *   1. Validate file (presence, extension, size)
 *   2. Write the bytes to {workDir}/{jobId}_{filename}
 *   3. Register the job at QUEUED and hand it to the dispatcher
 *   4. Return the queued status without waiting for processing
 *
 * Failure invariants:
 *   - Validation failures write nothing
 *   - A full queue removes the written file and registers no job
 */
@Injectable()
export class OcrUploadService {
  private readonly logger = new Logger(OcrUploadService.name);
  private readonly settings: UploadSettings;
  private readonly maxFileSizeBytes: number;

  constructor(
    private readonly registry: JobRegistry,
    private readonly workspace: WorkspaceService,
    private readonly dispatcher: JobDispatcherService,
    configService: ConfigService<AppConfiguration, true>,
  ) {
    this.settings = configService.get('upload', { infer: true });
    this.maxFileSizeBytes = maxUploadBytes(this.settings);
  }

  async upload(file: Express.Multer.File | undefined, owner: string): Promise<OcrStatusDto> {
    // ── Step 1: Validate file ──────────────────────────────
    if (!file) {
      throw new MissingFileException();
    }

    const filename = file.originalname;
    if (!hasAllowedExtension(filename, this.settings)) {
      this.logger.warn(`Rejected upload "${filename}" from ${owner}: unsupported type`);
      throw new UnsupportedFileTypeException(filename, this.settings.allowedExtensions);
    }

    if (file.buffer.length > this.maxFileSizeBytes) {
      this.logger.warn(
        `Rejected upload "${filename}" from ${owner}: ${file.buffer.length} bytes`,
      );
      throw new FileTooLargeException(this.settings.maxFileSizeMb);
    }

    // ── Step 2: Persist the bytes ──────────────────────────
    const jobId = randomUUID();
    const sourceFilePath = this.workspace.sourcePathFor(jobId, filename);

    try {
      await this.workspace.persistUpload(sourceFilePath, file.buffer);
    } catch (error) {
      this.logger.error(`Failed to store upload for job ${jobId}: ${errorMessage(error)}`);
      await this.workspace.discardUpload(sourceFilePath);
      throw new UploadPersistenceException(error);
    }

    // ── Step 3: Register and enqueue ───────────────────────
    // No await between the capacity check and enqueue(), so the check holds.
    if (!this.dispatcher.hasCapacity()) {
      await this.workspace.discardUpload(sourceFilePath);
      this.logger.warn(`Rejected upload "${filename}" from ${owner}: queue full`);
      throw new QueueFullException(this.dispatcher.stats().capacity);
    }

    const job = this.registry.create({
      id: jobId,
      owner,
      originalFilename: filename,
      sourceFilePath,
      workspacePath: this.workspace.allocate(jobId),
    });
    this.dispatcher.enqueue(jobId);

    this.logger.log(`Accepted upload "${filename}" from ${owner} as job ${jobId}`);
    return toOcrStatusDto(job);
  }
}
