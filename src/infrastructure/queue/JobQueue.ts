import { describeError } from '../../core/errors.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('JobQueue');

export type JobRunner = (jobId: string) => Promise<unknown>;

export interface QueueStatistics {
  pending: number;
  running: number;
  processed: number;
  failed: number;
  maxConcurrent: number;
}

/**
 * FIFO scheduler for research jobs.
 *
 * Holds job ids only; the ledger owns job state. At most `maxConcurrent`
 * runner calls are in flight at once.
 */
export class JobQueue {
  private pending: string[] = [];
  private running: Map<string, Promise<void>> = new Map();
  private processed = 0;
  private failed = 0;
  private runner?: JobRunner;
  private idleWaiters: Array<() => void> = [];

  constructor(private readonly maxConcurrent: number = 2) {}

  /**
   * Attach the function that executes a job. Queued ids start once attached.
   */
  onJobStarted(runner: JobRunner): void {
    this.runner = runner;
    this.processQueue();
  }

  submit(jobId: string): void {
    if (this.pending.includes(jobId) || this.running.has(jobId)) {
      return;
    }
    this.pending.push(jobId);
    this.processQueue();
  }

  /**
   * Drop a job that has not started yet
   */
  remove(jobId: string): boolean {
    const index = this.pending.indexOf(jobId);
    if (index === -1) return false;
    this.pending.splice(index, 1);
    this.notifyIfIdle();
    return true;
  }

  isPending(jobId: string): boolean {
    return this.pending.includes(jobId);
  }

  isRunning(jobId: string): boolean {
    return this.running.has(jobId);
  }

  getStatistics(): QueueStatistics {
    return {
      pending: this.pending.length,
      running: this.running.size,
      processed: this.processed,
      failed: this.failed,
      maxConcurrent: this.maxConcurrent,
    };
  }

  /**
   * Resolves once nothing is queued or running
   */
  onIdle(): Promise<void> {
    if (this.pending.length === 0 && this.running.size === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /**
   * Stop starting new jobs and wait for the running ones to settle
   */
  async drain(): Promise<void> {
    const dropped = this.pending.length;
    this.pending = [];
    if (dropped > 0) {
      log.info(`Left ${dropped} queued job(s) pending for the next start`);
    }
    await Promise.all(this.running.values());
    this.notifyIfIdle();
  }

  private processQueue(): void {
    const runner = this.runner;
    if (!runner) return;

    while (this.pending.length > 0 && this.running.size < this.maxConcurrent) {
      const jobId = this.pending.shift();
      if (!jobId) break;

      log.debug(`Starting job ${jobId}`);
      const execution = runner(jobId)
        .then(() => {
          this.processed++;
        })
        .catch((error: unknown) => {
          this.failed++;
          log.error(`Job ${jobId} crashed: ${describeError(error)}`);
        })
        .finally(() => {
          this.running.delete(jobId);
          this.processQueue();
          this.notifyIfIdle();
        });
      this.running.set(jobId, execution);
    }
  }

  private notifyIfIdle(): void {
    if (this.pending.length > 0 || this.running.size > 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
