import { OcrJobStatus } from '../enums/ocr-job-status.enum';

export class DuplicateJobError extends Error {
  constructor(jobId: string) {
    super(`Job ${jobId} is already registered`);
    this.name = 'DuplicateJobError';
  }
}

export class UnknownJobError extends Error {
  constructor(jobId: string) {
    super(`Job ${jobId} is not registered`);
    this.name = 'UnknownJobError';
  }
}

/** A caller tried to move a job along an edge the state machine does not have */
export class InvalidTransitionError extends Error {
  readonly from: OcrJobStatus;
  readonly to: OcrJobStatus;

  constructor(jobId: string, from: OcrJobStatus, to: OcrJobStatus) {
    super(`Job ${jobId} cannot move from "${from}" to "${to}"`);
    this.name = 'InvalidTransitionError';
    this.from = from;
    this.to = to;
  }
}
