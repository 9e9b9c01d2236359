/**
 * @ocr-gateway/jobs
 *
 * Job records, lifecycle status and the in-memory registry shared by the
 * upload handler, the processing lane and the query handlers.
 */

// ── Enums ───────────────────────────────────────────────────
export { OcrJobStatus, progressFor, isTerminal } from './enums/ocr-job-status.enum';

// ── Interfaces ──────────────────────────────────────────────
export type { OcrJob, NewOcrJob, OcrJobResult } from './interfaces/ocr-job.interface';

// ── Errors ──────────────────────────────────────────────────
export { ProcessingFault } from './errors/processing-fault';
export {
  DuplicateJobError,
  UnknownJobError,
  InvalidTransitionError,
} from './errors/job-registry.errors';

// ── Registry & module ───────────────────────────────────────
export { JobRegistry } from './job-registry';
export { JobsModule } from './jobs.module';
