import { Test } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import type { AppConfiguration } from '../config/configuration.interface';
import { JobDispatcherService } from './job-dispatcher.service';
import { JobProcessorService } from './job-processor.service';
import { QueueFullException } from './exceptions/queue-full.exception';

function nextTick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe('JobDispatcherService', () => {
  let started: string[];
  let active: number;
  let peak: number;
  let processJob: jest.Mock<Promise<void>, [string]>;

  async function createDispatcher(
    maxConcurrentJobs: number,
    queueCapacity: number,
  ): Promise<JobDispatcherService> {
    const moduleRef = await Test.createTestingModule({
      providers: [
        JobDispatcherService,
        { provide: JobProcessorService, useValue: { process: processJob } },
        {
          provide: ConfigService,
          useValue: new ConfigService<AppConfiguration, true>({
            pipeline: { maxConcurrentJobs, queueCapacity },
          }),
        },
      ],
    }).compile();

    return moduleRef.get(JobDispatcherService);
  }

  beforeEach(() => {
    started = [];
    active = 0;
    peak = 0;
    processJob = jest.fn(async (jobId: string) => {
      started.push(jobId);
      active++;
      peak = Math.max(peak, active);
      await nextTick();
      await nextTick();
      active--;
    });
  });

  it('starts processing on a later tick than enqueue', async () => {
    const dispatcher = await createDispatcher(1, 5);

    dispatcher.enqueue('a');

    expect(processJob).not.toHaveBeenCalled();
    expect(dispatcher.stats()).toEqual({ queued: 1, running: 0, capacity: 5, concurrency: 1 });

    await dispatcher.onIdle();
    expect(processJob).toHaveBeenCalledWith('a');
  });

  it('runs jobs in FIFO order with bounded concurrency', async () => {
    const dispatcher = await createDispatcher(2, 10);

    for (const id of ['a', 'b', 'c', 'd', 'e']) {
      dispatcher.enqueue(id);
    }
    await dispatcher.onIdle();

    expect(started).toEqual(['a', 'b', 'c', 'd', 'e']);
    expect(peak).toBe(2);
    expect(dispatcher.stats().running).toBe(0);
  });

  it('rejects jobs once the waiting queue is full', async () => {
    const dispatcher = await createDispatcher(1, 1);

    dispatcher.enqueue('a');

    expect(dispatcher.hasCapacity()).toBe(false);
    expect(() => dispatcher.enqueue('b')).toThrow(QueueFullException);

    await dispatcher.onIdle();
    expect(dispatcher.hasCapacity()).toBe(true);
    expect(started).toEqual(['a']);
  });

  it('keeps draining after a processor rejection', async () => {
    const dispatcher = await createDispatcher(1, 5);
    processJob.mockRejectedValueOnce(new Error('boom'));

    dispatcher.enqueue('a');
    dispatcher.enqueue('b');
    await dispatcher.onIdle();

    expect(processJob).toHaveBeenCalledTimes(2);
    expect(started).toEqual(['b']);
  });

  it('resolves onIdle immediately when nothing is queued', async () => {
    const dispatcher = await createDispatcher(1, 5);

    await expect(dispatcher.onIdle()).resolves.toBeUndefined();
  });
});
