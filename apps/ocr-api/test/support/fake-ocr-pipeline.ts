import { mkdir, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import type { OcrPipeline, PipelineOutcome, PipelineRequest } from '@ocr-gateway/pipeline';

export type PipelineBehaviour = (request: PipelineRequest) => Promise<PipelineOutcome>;

/** Writes `text` to {workspace}/markdown/{relativePath} and succeeds */
export function emitMarkdown(text: string, relativePath = 'output.md'): PipelineBehaviour {
  return async (request) => {
    const target = join(request.workspaceDir, 'markdown', relativePath);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, text);
    return { status: 'succeeded', diagnostics: '' };
  };
}

export function failWith(diagnostics: string, exitCode: number | null = 1): PipelineBehaviour {
  return async () => ({ status: 'failed', exitCode, diagnostics });
}

export interface HeldBehaviour {
  behaviour: PipelineBehaviour;
  /** Resolves once the pipeline has been called */
  started: Promise<void>;
  release(): void;
}

/** Waits for `release()` before handing the request to `inner` */
export function holdUntilReleased(inner: PipelineBehaviour): HeldBehaviour {
  let markStarted: () => void = () => undefined;
  let release: () => void = () => undefined;
  const started = new Promise<void>((resolve) => {
    markStarted = resolve;
  });
  const released = new Promise<void>((resolve) => {
    release = resolve;
  });

  return {
    started,
    release: () => release(),
    behaviour: async (request) => {
      markStarted();
      await released;
      return inner(request);
    },
  };
}

/** In-process OcrPipeline that records every request it receives */
export class FakeOcrPipeline implements OcrPipeline {
  readonly requests: PipelineRequest[] = [];

  constructor(public behaviour: PipelineBehaviour = emitMarkdown('Hello')) {}

  async run(request: PipelineRequest): Promise<PipelineOutcome> {
    this.requests.push(request);
    return this.behaviour(request);
  }
}
