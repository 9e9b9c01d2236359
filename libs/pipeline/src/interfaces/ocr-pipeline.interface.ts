/**
 * Contract between the processing lane and the external OCR program.
 *
 * The processor only ever talks to `OcrPipeline`; the subprocess adapter is
 * one implementation and tests bind an in-process fake to the same token.
 */

/** Injection token for the active OcrPipeline implementation */
export const OCR_PIPELINE = 'OCR_PIPELINE';

/** Extraction switches, each translated to a command-line flag */
export interface PipelineOptions {
  markdown: boolean;
  extractTables: boolean;
  extractFigures: boolean;
}

/**
 * Settings read from the `pipeline` configuration section.
 *
 * `timeoutSeconds` of 0 lets a run take as long as it needs.
 */
export interface PipelineSettings {
  command: string;
  args: string[];
  options: PipelineOptions;
  timeoutSeconds: number;
  maxConcurrentJobs: number;
  queueCapacity: number;
}

export interface PipelineRequest {
  jobId: string;
  workspaceDir: string;
  sourcePath: string;
  options: PipelineOptions;
}

export type PipelineOutcome =
  | { status: 'succeeded'; diagnostics: string }
  | { status: 'failed'; exitCode: number | null; diagnostics: string };

export interface OcrPipeline {
  /** Resolves with the outcome of one run; never rejects for a failed run */
  run(request: PipelineRequest): Promise<PipelineOutcome>;
}
