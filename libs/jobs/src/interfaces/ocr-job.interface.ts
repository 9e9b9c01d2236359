import { OcrJobStatus } from '../enums/ocr-job-status.enum';

/**
 * One upload and its tracked lifecycle.
 *
 * Invariants:
 * - `id` is assigned once at creation and never reused
 * - `resultText` and `resultPath` are set only when status is COMPLETED
 * - `error` is set only when status is FAILED
 * - `startedAt` is set on QUEUED → PROCESSING
 * - `finishedAt` is set on entering COMPLETED or FAILED
 *
 * Records handed out by the registry are frozen snapshots.
 */
export interface OcrJob {
  readonly id: string;
  readonly status: OcrJobStatus;

  /** Username of the uploading user */
  readonly owner: string;

  /** Filename as sent by the client */
  readonly originalFilename: string;

  /** Absolute path of the persisted upload: {workDir}/{id}_{filename} */
  readonly sourceFilePath: string;

  /** {workDir}/{id}, created by the processor, not at upload time */
  readonly workspacePath: string;

  readonly resultText: string | null;
  readonly resultPath: string | null;
  readonly error: string | null;

  readonly createdAt: Date;
  readonly updatedAt: Date;
  readonly startedAt: Date | null;
  readonly finishedAt: Date | null;
}

/** Fields supplied by the upload handler when a job is created */
export interface NewOcrJob {
  id: string;
  owner: string;
  originalFilename: string;
  sourceFilePath: string;
  workspacePath: string;
}

/** Output of a successful run, recorded on COMPLETED */
export interface OcrJobResult {
  resultText: string;
  resultPath: string;
}
