import { Logger } from '@nestjs/common';
import { spawn } from 'child_process';
import type { ChildProcess } from 'child_process';
import { buildPipelineArgs } from './build-pipeline-args';
import type {
  OcrPipeline,
  PipelineOutcome,
  PipelineRequest,
  PipelineSettings,
} from './interfaces/ocr-pipeline.interface';

/**
 * SubprocessOcrPipeline — runs the OCR program as a child process.
 *
 * The child leads its own process group, so a timeout kills the helpers it
 * started as well. stderr is collected for diagnostics; stdout is drained
 * and only counted. A non-zero exit, a spawn error or an expired timeout
 * all resolve to a `failed` outcome whose diagnostics are what the
 * processor stores on the job.
 */
export class SubprocessOcrPipeline implements OcrPipeline {
  private readonly logger = new Logger(SubprocessOcrPipeline.name);

  constructor(
    private readonly settings: Pick<PipelineSettings, 'command' | 'args' | 'timeoutSeconds'>,
  ) {}

  run(request: PipelineRequest): Promise<PipelineOutcome> {
    const { command, timeoutSeconds } = this.settings;
    const args = buildPipelineArgs(this.settings.args, request);

    this.logger.debug(`Job ${request.jobId}: executing ${[command, ...args].join(' ')}`);

    return new Promise<PipelineOutcome>((resolve) => {
      const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'], detached: true });

      const stderr: Buffer[] = [];
      let stdoutBytes = 0;
      let settled = false;

      const finish = (outcome: PipelineOutcome): void => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        resolve(outcome);
      };

      // Resolves without waiting for `close`: helpers holding the pipes may outlive the kill.
      const timer =
        timeoutSeconds > 0
          ? setTimeout(() => {
              this.logger.warn(
                `Job ${request.jobId}: pipeline exceeded ${timeoutSeconds}s, killing process group ${child.pid ?? 'unknown'}`,
              );
              this.killProcessGroup(child);
              child.stdout.destroy();
              child.stderr.destroy();
              finish({
                status: 'failed',
                exitCode: null,
                diagnostics: `pipeline timed out after ${timeoutSeconds} seconds`,
              });
            }, timeoutSeconds * 1000)
          : null;

      child.stdout.on('data', (chunk: Buffer) => {
        stdoutBytes += chunk.length;
      });
      child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

      child.on('error', (err) => {
        finish({
          status: 'failed',
          exitCode: null,
          diagnostics: `failed to start pipeline: ${err.message}`,
        });
      });

      child.on('close', (code, signal) => {
        const diagnostics = Buffer.concat(stderr).toString('utf8');
        this.logger.debug(
          `Job ${request.jobId}: pipeline closed (code=${code ?? 'null'}, signal=${signal ?? 'none'}, ` +
            `stdout=${stdoutBytes}B, stderr=${diagnostics.length}B)`,
        );

        if (code === 0) {
          finish({ status: 'succeeded', diagnostics });
          return;
        }

        finish({
          status: 'failed',
          exitCode: code,
          diagnostics: diagnostics || describeExit(code, signal),
        });
      });
    });
  }

  private killProcessGroup(child: ChildProcess): void {
    if (child.pid === undefined) {
      return;
    }

    try {
      process.kill(-child.pid, 'SIGKILL');
    } catch (error) {
      const code =
        typeof error === 'object' && error !== null && 'code' in error ? String(error.code) : String(error);
      this.logger.debug(`Process group ${child.pid} not signalled (${code}); killing the child alone`);
      child.kill('SIGKILL');
    }
  }
}

function describeExit(code: number | null, signal: NodeJS.Signals | null): string {
  if (code === null) {
    return `pipeline terminated by signal ${signal ?? 'unknown'}`;
  }
  return `pipeline exited with code ${code}`;
}
