import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { mkdir, rm, unlink, writeFile } from 'fs/promises';
import { basename, join, resolve } from 'path';
import type { AppConfiguration } from '../config/configuration.interface';
import { ConfigurationError } from '../config/configuration.error';
import { errorMessage } from '../common/errors/error-details';

/** Max length of the sanitized filename suffix on a persisted upload */
const MAX_FILENAME_LENGTH = 150;

const WRITE_TEST_FILENAME = '.write_test';

/**
 * WorkspaceService — owns the on-disk layout under the work directory.
 *
 *   {workDir}/{jobId}_{filename}   uploaded source, written at upload time
 *   {workDir}/{jobId}/             job workspace, created by the processor
 *   {workDir}/{jobId}/markdown/    pipeline output
 *
 * A job's workspace is touched only by that job.
 */
@Injectable()
export class WorkspaceService implements OnModuleInit {
  private readonly logger = new Logger(WorkspaceService.name);
  readonly root: string;

  constructor(configService: ConfigService<AppConfiguration, true>) {
    this.root = resolve(configService.get('workDir', { infer: true }));
  }

  /**
   * Prepares the work directory before the first request is served.
   * A missing or read-only directory stops the application from starting.
   */
  async onModuleInit(): Promise<void> {
    await this.ensureRoot(this.root);
    this.logger.log(`Work directory ready: ${this.root}`);
  }

  /**
   * Creates `path` if needed and proves it is writable by writing and
   * removing a test file.
   *
   * @throws ConfigurationError if either step fails
   */
  async ensureRoot(path: string): Promise<void> {
    try {
      await mkdir(path, { recursive: true });
    } catch (error) {
      throw new ConfigurationError(
        `Cannot create work directory ${path}: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    const testFile = join(path, WRITE_TEST_FILENAME);
    try {
      await writeFile(testFile, 'ok');
      await unlink(testFile);
    } catch (error) {
      throw new ConfigurationError(
        `Work directory ${path} is not writable: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  /** Workspace path for a job. Not created here. */
  allocate(jobId: string): string {
    return join(this.root, jobId);
  }

  /** Where an upload is persisted: {workDir}/{jobId}_{sanitized filename} */
  sourcePathFor(jobId: string, originalFilename: string): string {
    return join(this.root, `${jobId}_${sanitizeFilename(originalFilename)}`);
  }

  /** Creates a job workspace; an existing directory is fine. */
  async ensureJobWorkspace(workspacePath: string): Promise<void> {
    await mkdir(workspacePath, { recursive: true });
  }

  async persistUpload(path: string, contents: Buffer): Promise<void> {
    await writeFile(path, contents, { flag: 'wx' });
  }

  async discardUpload(path: string): Promise<void> {
    await rm(path, { force: true });
  }
}

/**
 * Drops any directory part, replaces characters outside [A-Za-z0-9._-]
 * with "_" and truncates to MAX_FILENAME_LENGTH.
 */
export function sanitizeFilename(filename: string): string {
  const name = basename(filename.replace(/\\/g, '/'))
    .replace(/[^a-zA-Z0-9._-]/g, '_')
    .slice(0, MAX_FILENAME_LENGTH);
  return name.length > 0 ? name : 'upload';
}
