/**
 * Lifecycle status of an OCR job.
 *
 * Transitions:
 *   QUEUED → PROCESSING → COMPLETED
 *                       → FAILED
 *
 * COMPLETED and FAILED are terminal. Jobs are never retried automatically.
 */
export enum OcrJobStatus {
  /** Upload accepted, waiting for a worker slot */
  QUEUED = 'queued',

  /** The external pipeline is running against the job's workspace */
  PROCESSING = 'processing',

  /** A markdown artifact was produced and read back */
  COMPLETED = 'completed',

  /** See the job's `error` field for details */
  FAILED = 'failed',
}

/** Coarse progress reported to clients for each status */
const PROGRESS_BY_STATUS: Record<OcrJobStatus, number> = {
  [OcrJobStatus.QUEUED]: 0,
  [OcrJobStatus.PROCESSING]: 0.5,
  [OcrJobStatus.COMPLETED]: 1,
  [OcrJobStatus.FAILED]: 0,
};

export function progressFor(status: OcrJobStatus): number {
  return PROGRESS_BY_STATUS[status];
}

export function isTerminal(status: OcrJobStatus): boolean {
  return status === OcrJobStatus.COMPLETED || status === OcrJobStatus.FAILED;
}
