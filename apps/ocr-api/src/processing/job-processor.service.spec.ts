import { ConfigService } from '@nestjs/config';
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { JobRegistry, OcrJobStatus } from '@ocr-gateway/jobs';
import type { AppConfiguration } from '../config/configuration.interface';
import { WorkspaceService } from '../workspace/workspace.service';
import { JobProcessorService, NO_RESULT_MESSAGE } from './job-processor.service';
import {
  FakeOcrPipeline,
  emitMarkdown,
  failWith,
} from '../../test/support/fake-ocr-pipeline';

const OPTIONS = { markdown: true, extractTables: false, extractFigures: true };

describe('JobProcessorService', () => {
  let dir: string;
  let registry: JobRegistry;
  let workspace: WorkspaceService;
  let pipeline: FakeOcrPipeline;
  let processor: JobProcessorService;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'ocr-processor-'));
    const config = new ConfigService<AppConfiguration, true>({
      workDir: dir,
      pipeline: { options: OPTIONS },
    });

    registry = new JobRegistry();
    workspace = new WorkspaceService(config);
    pipeline = new FakeOcrPipeline();
    processor = new JobProcessorService(registry, workspace, pipeline, config);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function register(id: string) {
    return registry.create({
      id,
      owner: 'alice',
      originalFilename: 'report.pdf',
      sourceFilePath: workspace.sourcePathFor(id, 'report.pdf'),
      workspacePath: workspace.allocate(id),
    });
  }

  it('completes a job with the text of the markdown artifact', async () => {
    const job = register('job-1');
    pipeline.behaviour = emitMarkdown('Hello', 'report.md');

    await processor.process('job-1');

    const done = registry.get('job-1');
    expect(done?.status).toBe(OcrJobStatus.COMPLETED);
    expect(done?.resultText).toBe('Hello');
    expect(done?.resultPath).toBe(join(dir, 'job-1', 'markdown', 'report.md'));
    expect(done?.error).toBeNull();
    expect(done?.startedAt).toBeInstanceOf(Date);
    expect(done?.finishedAt).toBeInstanceOf(Date);
    expect(pipeline.requests).toEqual([
      {
        jobId: 'job-1',
        workspaceDir: job.workspacePath,
        sourcePath: job.sourceFilePath,
        options: OPTIONS,
      },
    ]);
  });

  it('records the pipeline diagnostics when the run fails', async () => {
    register('job-2');
    pipeline.behaviour = failWith('decode error');

    await processor.process('job-2');

    const failed = registry.get('job-2');
    expect(failed?.status).toBe(OcrJobStatus.FAILED);
    expect(failed?.error).toBe('decode error');
    expect(failed?.resultText).toBeNull();
  });

  it('fails when the pipeline succeeds without writing markdown', async () => {
    register('job-3');
    pipeline.behaviour = async () => ({ status: 'succeeded', diagnostics: '' });

    await processor.process('job-3');

    expect(registry.get('job-3')?.status).toBe(OcrJobStatus.FAILED);
    expect(registry.get('job-3')?.error).toBe(NO_RESULT_MESSAGE);
  });

  it('fails when the only artifact is empty', async () => {
    register('job-4');
    pipeline.behaviour = emitMarkdown('');

    await processor.process('job-4');

    expect(registry.get('job-4')?.error).toBe(NO_RESULT_MESSAGE);
  });

  it('records a thrown error as the failure reason', async () => {
    register('job-5');
    pipeline.behaviour = async () => {
      throw new Error('pipeline crashed');
    };

    await expect(processor.process('job-5')).resolves.toBeUndefined();

    expect(registry.get('job-5')?.status).toBe(OcrJobStatus.FAILED);
    expect(registry.get('job-5')?.error).toBe('pipeline crashed');
  });

  it('picks the first artifact by relative path', async () => {
    register('job-6');
    pipeline.behaviour = async (request) => {
      const markdown = join(request.workspaceDir, 'markdown');
      await mkdir(join(markdown, 'a'), { recursive: true });
      await writeFile(join(markdown, 'b.md'), 'second');
      await writeFile(join(markdown, 'a', 'z.md'), 'first');
      await writeFile(join(markdown, 'a', 'notes.txt'), 'ignored');
      return { status: 'succeeded', diagnostics: '' };
    };

    await processor.process('job-6');

    expect(registry.get('job-6')?.resultText).toBe('first');
    expect(registry.get('job-6')?.resultPath).toBe(join(dir, 'job-6', 'markdown', 'a', 'z.md'));
  });

  it('leaves the registry alone for an unknown job', async () => {
    await expect(processor.process('missing')).resolves.toBeUndefined();

    expect(registry.size).toBe(0);
    expect(pipeline.requests).toHaveLength(0);
  });

  it('does not run a job twice', async () => {
    register('job-7');
    await processor.process('job-7');
    await processor.process('job-7');

    expect(pipeline.requests).toHaveLength(1);
    expect(registry.get('job-7')?.status).toBe(OcrJobStatus.COMPLETED);
  });
});
