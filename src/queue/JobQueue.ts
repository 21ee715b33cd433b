import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

export interface QueueStats {
  queued: number;
  running: number;
  maxConcurrent: number;
}

/**
 * JobQueue - Runs jobs with a concurrency limit.
 * Jobs wait in FIFO order until a slot frees up.
 */
export class JobQueue {
  private queue: string[] = [];
  private running: Set<string> = new Set();
  private readonly maxConcurrent: number;
  private processor?: (jobId: string) => Promise<void>;
  private idleWaiters: Array<() => void> = [];

  constructor(maxConcurrent: number = 2) {
    this.maxConcurrent = Math.max(1, maxConcurrent);
    logger.info('🎯 JobQueue initialized', { maxConcurrent: this.maxConcurrent });
  }

  /**
   * Set the function that runs a dequeued job
   */
  setProcessor(processor: (jobId: string) => Promise<void>): void {
    this.processor = processor;
  }

  /**
   * Add a job to the queue. Returns its position (0 when it started at once).
   */
  enqueue(jobId: string): number {
    this.queue.push(jobId);
    logger.debug('📥 Job queued', {
      jobId,
      position: this.queue.length,
      running: this.running.size,
    });

    this.processNext();
    const index = this.queue.indexOf(jobId);
    return index + 1;
  }

  /**
   * Remove a job that has not started yet
   */
  remove(jobId: string): boolean {
    const index = this.queue.indexOf(jobId);
    if (index === -1) return false;
    this.queue.splice(index, 1);
    logger.debug('🗑️ Job removed from queue', { jobId });
    this.notifyIfIdle();
    return true;
  }

  stats(): QueueStats {
    return {
      queued: this.queue.length,
      running: this.running.size,
      maxConcurrent: this.maxConcurrent,
    };
  }

  /**
   * Resolve once nothing is queued or running
   */
  onIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /**
   * Wait for the queue to go idle, giving up after timeoutMs. Resolves true when idle.
   */
  async drain(timeoutMs: number): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    try {
      return await Promise.race([this.onIdle().then(() => true), expired]);
    } finally {
      clearTimeout(timer);
    }
  }

  private processNext(): void {
    while (this.running.size < this.maxConcurrent && this.queue.length > 0) {
      const jobId = this.queue.shift();
      if (jobId === undefined) break;
      this.running.add(jobId);
      logger.debug('▶️ Dispatching job', {
        jobId,
        running: this.running.size,
        queued: this.queue.length,
      });
      // Start on the next turn so callers see the job queued first
      setImmediate(() => {
        void this.execute(jobId);
      });
    }
  }

  private async execute(jobId: string): Promise<void> {
    try {
      if (this.processor) {
        await this.processor(jobId);
      } else {
        logger.error('No processor set for JobQueue');
      }
    } catch (error: unknown) {
      logger.error('Failed to process job', {
        jobId,
        error: errorMessage(error),
      });
    } finally {
      this.running.delete(jobId);
      this.processNext();
      this.notifyIfIdle();
    }
  }

  private isIdle(): boolean {
    return this.queue.length === 0 && this.running.size === 0;
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach((resolve) => resolve());
  }
}
