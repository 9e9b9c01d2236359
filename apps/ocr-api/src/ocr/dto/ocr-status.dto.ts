import { OcrJobStatus, progressFor } from '@ocr-gateway/jobs';
import type { OcrJob } from '@ocr-gateway/jobs';

/**
 * Response body of POST /ocr/upload and GET /ocr/status/:jobId.
 */
export class OcrStatusDto {
  /** UUID of the job */
  task_id!: string;

  status!: OcrJobStatus;

  /** 0 while queued or failed, 0.5 while processing, 1 once completed */
  progress!: number;

  /** Path of the markdown artifact, null until completed */
  result_path!: string | null;

  /** Failure detail, null unless failed */
  error!: string | null;

  /** ISO timestamp of the upload */
  created_at!: string;
}

export function toOcrStatusDto(job: OcrJob): OcrStatusDto {
  return {
    task_id: job.id,
    status: job.status,
    progress: progressFor(job.status),
    result_path: job.resultPath,
    error: job.error,
    created_at: job.createdAt.toISOString(),
  };
}
