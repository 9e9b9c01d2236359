import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readFile } from 'fs/promises';
import { JobRegistry, ProcessingFault } from '@ocr-gateway/jobs';
import type { OcrJob, OcrJobResult } from '@ocr-gateway/jobs';
import { OCR_PIPELINE } from '@ocr-gateway/pipeline';
import type { OcrPipeline, PipelineOptions } from '@ocr-gateway/pipeline';
import type { AppConfiguration } from '../config/configuration.interface';
import { errorMessage } from '../common/errors/error-details';
import { WorkspaceService } from '../workspace/workspace.service';
import { locateMarkdownArtifact } from './markdown-artifact';

export const NO_RESULT_MESSAGE = 'processing completed but no result file found';

const UNKNOWN_FAILURE_MESSAGE = 'processing failed for an unknown reason';

/**
 * JobProcessorService — drives one job from QUEUED to a terminal state.
 *
 * 1. markProcessing()
 * 2. create the job workspace
 * 3. run the OCR pipeline against the persisted upload
 * 4. read the first markdown artifact under {workspace}/markdown
 * 5. markCompleted() with its text, or markFailed() with the reason
 *
 * `process()` never rejects: every fault ends up on the job record.
 */
@Injectable()
export class JobProcessorService {
  private readonly logger = new Logger(JobProcessorService.name);
  private readonly options: PipelineOptions;

  constructor(
    private readonly registry: JobRegistry,
    private readonly workspace: WorkspaceService,
    @Inject(OCR_PIPELINE)
    private readonly pipeline: OcrPipeline,
    configService: ConfigService<AppConfiguration, true>,
  ) {
    this.options = configService.get('pipeline', { infer: true }).options;
  }

  async process(jobId: string): Promise<void> {
    let job: OcrJob;
    try {
      job = this.registry.markProcessing(jobId);
    } catch (error) {
      this.logger.error(`Cannot start job ${jobId}: ${describeFault(error)}`);
      return;
    }

    this.logger.log(`Processing job ${jobId} (${job.originalFilename})`);

    try {
      const result = await this.runPipeline(job);
      this.registry.markCompleted(jobId, result);
      this.logger.log(`Job ${jobId} completed: ${result.resultPath}`);
    } catch (error) {
      const message = describeFault(error);
      const exitCode = error instanceof ProcessingFault ? ` (exit code ${String(error.exitCode)})` : '';
      this.logger.error(`Job ${jobId} failed${exitCode}: ${message}`);
      this.recordFailure(jobId, message);
    }
  }

  // ── Private helpers ───────────────────────────────────────

  private async runPipeline(job: OcrJob): Promise<OcrJobResult> {
    await this.workspace.ensureJobWorkspace(job.workspacePath);

    const outcome = await this.pipeline.run({
      jobId: job.id,
      workspaceDir: job.workspacePath,
      sourcePath: job.sourceFilePath,
      options: this.options,
    });

    if (outcome.status === 'failed') {
      throw new ProcessingFault(outcome.diagnostics, outcome.exitCode);
    }

    const resultPath = await locateMarkdownArtifact(job.workspacePath);
    if (!resultPath) {
      throw new ProcessingFault(NO_RESULT_MESSAGE);
    }

    const resultText = await readFile(resultPath, 'utf8');
    if (resultText.length === 0) {
      throw new ProcessingFault(NO_RESULT_MESSAGE);
    }

    return { resultText, resultPath };
  }

  private recordFailure(jobId: string, message: string): void {
    try {
      this.registry.markFailed(jobId, message);
    } catch (error) {
      this.logger.error(`Could not record failure of job ${jobId}: ${describeFault(error)}`);
    }
  }
}

function describeFault(error: unknown): string {
  const message = errorMessage(error);
  return message.length > 0 ? message : UNKNOWN_FAILURE_MESSAGE;
}
