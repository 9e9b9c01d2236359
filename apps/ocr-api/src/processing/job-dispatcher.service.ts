import { Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfiguration } from '../config/configuration.interface';
import { errorMessage } from '../common/errors/error-details';
import { QueueFullException } from './exceptions/queue-full.exception';
import { JobProcessorService } from './job-processor.service';

export interface DispatcherStats {
  queued: number;
  running: number;
  capacity: number;
  concurrency: number;
}

/**
 * Bounded FIFO in front of JobProcessorService.
 *
 * At most `maxConcurrentJobs` jobs run at once; up to `queueCapacity`
 * more wait their turn. Processing always starts on a later tick than
 * `enqueue()`, so the upload response is sent before the job moves.
 */
@Injectable()
export class JobDispatcherService implements OnApplicationShutdown {
  private readonly logger = new Logger(JobDispatcherService.name);
  private readonly waiting: string[] = [];
  private readonly idleWaiters: Array<() => void> = [];
  private readonly concurrency: number;
  private readonly capacity: number;
  private running = 0;

  constructor(
    private readonly processor: JobProcessorService,
    configService: ConfigService<AppConfiguration, true>,
  ) {
    const settings = configService.get('pipeline', { infer: true });
    this.concurrency = settings.maxConcurrentJobs;
    this.capacity = settings.queueCapacity;
  }

  hasCapacity(): boolean {
    return this.waiting.length < this.capacity;
  }

  /**
   * @throws QueueFullException when `queueCapacity` jobs are already waiting
   */
  enqueue(jobId: string): void {
    if (!this.hasCapacity()) {
      throw new QueueFullException(this.capacity);
    }

    this.waiting.push(jobId);
    this.logger.debug(`Queued job ${jobId} (${this.waiting.length} waiting)`);
    setImmediate(() => this.drain());
  }

  stats(): DispatcherStats {
    return {
      queued: this.waiting.length,
      running: this.running,
      capacity: this.capacity,
      concurrency: this.concurrency,
    };
  }

  /** Resolves once nothing is waiting or running. */
  onIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  onApplicationShutdown(): void {
    if (!this.isIdle()) {
      this.logger.warn(
        `Shutting down with ${this.running} running and ${this.waiting.length} waiting jobs`,
      );
    }
  }

  // ── Private helpers ───────────────────────────────────────

  private drain(): void {
    while (this.running < this.concurrency) {
      const jobId = this.waiting.shift();
      if (jobId === undefined) {
        break;
      }

      this.running++;
      this.processor
        .process(jobId)
        .catch((err: unknown) => {
          this.logger.error(`Unhandled error while processing job ${jobId}: ${errorMessage(err)}`);
        })
        .finally(() => {
          this.running--;
          this.drain();
          this.notifyIfIdle();
        });
    }
  }

  private isIdle(): boolean {
    return this.running === 0 && this.waiting.length === 0;
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) {
      return;
    }
    for (const resolve of this.idleWaiters.splice(0)) {
      resolve();
    }
  }
}
