import { Injectable, Logger } from '@nestjs/common';
import { OcrJobStatus, isTerminal } from './enums/ocr-job-status.enum';
import type { NewOcrJob, OcrJob, OcrJobResult } from './interfaces/ocr-job.interface';
import {
  DuplicateJobError,
  InvalidTransitionError,
  UnknownJobError,
} from './errors/job-registry.errors';

/** Edges of the job state machine. Anything not listed here is rejected. */
const ALLOWED_TRANSITIONS: Readonly<Record<OcrJobStatus, readonly OcrJobStatus[]>> = {
  [OcrJobStatus.QUEUED]: [OcrJobStatus.PROCESSING],
  [OcrJobStatus.PROCESSING]: [OcrJobStatus.COMPLETED, OcrJobStatus.FAILED],
  [OcrJobStatus.COMPLETED]: [],
  [OcrJobStatus.FAILED]: [],
};

type JobPatch = Partial<
  Pick<OcrJob, 'resultText' | 'resultPath' | 'error' | 'startedAt'>
>;

/**
 * JobRegistry — in-memory store of every job known to this process.
 *
 * Each entry is a frozen snapshot. A mutation builds the next snapshot and
 * swaps it into the map in one synchronous step, so a status read running
 * between two awaits of the processor sees either the old record or the new
 * one, never a mix. There is no registry-wide lock: unrelated jobs never
 * wait on each other.
 *
 * Entries live for the lifetime of the process.
 */
@Injectable()
export class JobRegistry {
  private readonly logger = new Logger(JobRegistry.name);
  private readonly jobs = new Map<string, OcrJob>();

  /**
   * Registers a new job at QUEUED.
   *
   * @throws DuplicateJobError if the id was ever registered before
   */
  create(input: NewOcrJob): OcrJob {
    if (this.jobs.has(input.id)) {
      throw new DuplicateJobError(input.id);
    }

    const now = new Date();
    const job: OcrJob = Object.freeze({
      id: input.id,
      status: OcrJobStatus.QUEUED,
      owner: input.owner,
      originalFilename: input.originalFilename,
      sourceFilePath: input.sourceFilePath,
      workspacePath: input.workspacePath,
      resultText: null,
      resultPath: null,
      error: null,
      createdAt: now,
      updatedAt: now,
      startedAt: null,
      finishedAt: null,
    });

    this.jobs.set(job.id, job);
    this.logger.debug(`Registered job ${job.id} for ${job.owner}`);
    return job;
  }

  get(jobId: string): OcrJob | undefined {
    return this.jobs.get(jobId);
  }

  get size(): number {
    return this.jobs.size;
  }

  markProcessing(jobId: string): OcrJob {
    return this.transition(jobId, OcrJobStatus.PROCESSING, {
      startedAt: new Date(),
    });
  }

  /**
   * @throws Error if `resultText` is empty
   */
  markCompleted(jobId: string, result: OcrJobResult): OcrJob {
    if (result.resultText.length === 0) {
      throw new Error(`Job ${jobId} cannot complete with an empty result`);
    }

    return this.transition(jobId, OcrJobStatus.COMPLETED, {
      resultText: result.resultText,
      resultPath: result.resultPath,
      error: null,
    });
  }

  markFailed(jobId: string, error: string): OcrJob {
    return this.transition(jobId, OcrJobStatus.FAILED, {
      resultText: null,
      resultPath: null,
      error,
    });
  }

  // ── Private helpers ───────────────────────────────────────

  private transition(jobId: string, to: OcrJobStatus, patch: JobPatch): OcrJob {
    const current = this.jobs.get(jobId);
    if (!current) {
      throw new UnknownJobError(jobId);
    }

    if (!ALLOWED_TRANSITIONS[current.status].includes(to)) {
      throw new InvalidTransitionError(jobId, current.status, to);
    }

    const now = new Date();
    const next: OcrJob = Object.freeze({
      ...current,
      ...patch,
      status: to,
      updatedAt: now,
      finishedAt: isTerminal(to) ? now : current.finishedAt,
    });

    this.jobs.set(jobId, next);
    this.logger.debug(`Job ${jobId}: ${current.status} → ${to}`);
    return next;
  }
}
