import { Injectable, Logger } from '@nestjs/common';
import { JobRegistry, OcrJobStatus } from '@ocr-gateway/jobs';
import type { OcrJob } from '@ocr-gateway/jobs';
import { OcrResultDto, OcrStatusDto, toOcrStatusDto } from './dto';
import {
  JobAccessForbiddenException,
  JobNotCompletedException,
  JobNotFoundException,
  ResultMissingException,
} from './exceptions/ocr.exceptions';

/**
 * Read-only views of a job for its owner.
 */
@Injectable()
export class OcrQueryService {
  private readonly logger = new Logger(OcrQueryService.name);

  constructor(private readonly registry: JobRegistry) {}

  getStatus(jobId: string, caller: string): OcrStatusDto {
    return toOcrStatusDto(this.findOwnedJob(jobId, caller));
  }

  /**
   * @throws JobNotCompletedException while the job is queued, processing or failed
   * @throws ResultMissingException if a completed job carries no text
   */
  getResult(jobId: string, caller: string): OcrResultDto {
    const job = this.findOwnedJob(jobId, caller);

    if (job.status !== OcrJobStatus.COMPLETED) {
      throw new JobNotCompletedException(job.status);
    }

    if (!job.resultText) {
      this.logger.error(`Job ${jobId} is completed but has no result text`);
      throw new ResultMissingException();
    }

    return {
      task_id: job.id,
      text: job.resultText,
      metadata: {
        created_at: job.createdAt.toISOString(),
        file_path: job.sourceFilePath,
        result_path: job.resultPath,
      },
    };
  }

  private findOwnedJob(jobId: string, caller: string): OcrJob {
    const job = this.registry.get(jobId);
    if (!job) {
      throw new JobNotFoundException(jobId);
    }

    if (job.owner !== caller) {
      this.logger.warn(`User ${caller} tried to access job ${jobId} owned by ${job.owner}`);
      throw new JobAccessForbiddenException();
    }

    return job;
  }
}
