import { ConfigService } from '@nestjs/config';
import { mkdtemp, readdir, readFile, rm, stat, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ConfigurationError } from '../config/configuration.error';
import type { AppConfiguration } from '../config/configuration.interface';
import { WorkspaceService, sanitizeFilename } from './workspace.service';

describe('WorkspaceService', () => {
  let dir: string;
  let service: WorkspaceService;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'ocr-workspace-'));
    service = new WorkspaceService(new ConfigService<AppConfiguration, true>({ workDir: join(dir, 'work') }));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('ensureRoot', () => {
    it('creates a missing directory and leaves no test file behind', async () => {
      await service.onModuleInit();

      expect((await stat(service.root)).isDirectory()).toBe(true);
      expect(await readdir(service.root)).toEqual([]);
    });

    it('accepts an existing directory', async () => {
      await service.ensureRoot(dir);

      expect(await readdir(dir)).toEqual([]);
    });

    it('fails with ConfigurationError when the path cannot be created', async () => {
      const blocker = join(dir, 'not-a-dir');
      await writeFile(blocker, 'x');

      await expect(service.ensureRoot(join(blocker, 'work'))).rejects.toBeInstanceOf(
        ConfigurationError,
      );
    });
  });

  describe('paths', () => {
    it('allocates {workDir}/{jobId} without creating it', async () => {
      await service.onModuleInit();

      const workspace = service.allocate('job-1');

      expect(workspace).toBe(join(dir, 'work', 'job-1'));
      await expect(stat(workspace)).rejects.toMatchObject({ code: 'ENOENT' });
    });

    it('places uploads next to the workspaces', () => {
      expect(service.sourcePathFor('job-1', 'report.pdf')).toBe(
        join(dir, 'work', 'job-1_report.pdf'),
      );
    });
  });

  describe('ensureJobWorkspace', () => {
    it('is idempotent', async () => {
      const workspace = service.allocate('job-1');

      await service.ensureJobWorkspace(workspace);
      await service.ensureJobWorkspace(workspace);

      expect((await stat(workspace)).isDirectory()).toBe(true);
    });
  });

  describe('uploads', () => {
    it('persists and discards upload bytes', async () => {
      await service.onModuleInit();
      const path = service.sourcePathFor('job-1', 'report.pdf');

      await service.persistUpload(path, Buffer.from('%PDF-1.7'));
      expect(await readFile(path, 'utf8')).toBe('%PDF-1.7');

      await service.discardUpload(path);
      await expect(stat(path)).rejects.toMatchObject({ code: 'ENOENT' });
    });

    it('never overwrites an existing file', async () => {
      await service.onModuleInit();
      const path = service.sourcePathFor('job-1', 'report.pdf');
      await service.persistUpload(path, Buffer.from('first'));

      await expect(service.persistUpload(path, Buffer.from('second'))).rejects.toMatchObject({
        code: 'EEXIST',
      });
      expect(await readFile(path, 'utf8')).toBe('first');
    });
  });
});

describe('sanitizeFilename', () => {
  it('keeps ordinary names', () => {
    expect(sanitizeFilename('report.pdf')).toBe('report.pdf');
    expect(sanitizeFilename('Scan_2024-01.JPG')).toBe('Scan_2024-01.JPG');
  });

  it('strips directory components', () => {
    expect(sanitizeFilename('../../etc/passwd')).toBe('passwd');
    expect(sanitizeFilename('C:\\Users\\alice\\report.pdf')).toBe('report.pdf');
  });

  it('replaces unsafe characters', () => {
    expect(sanitizeFilename('my report (final).pdf')).toBe('my_report__final_.pdf');
  });

  it('names empty input', () => {
    expect(sanitizeFilename('')).toBe('upload');
  });
});
