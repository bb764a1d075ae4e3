import { logger } from '../../utils/logger.js';
import type { ScanParams } from '../../types/index.js';
import { addJob, PRIORITIES, QUEUE_NAMES, ScanJob } from '../queue/QueueManager.js';

export type EnqueueScan = (job: ScanJob) => Promise<unknown>;

export interface ScanSchedulerOptions {
  intervalMs?: number;            // Default: 15 minutes
  params?: Partial<ScanParams>;
  runOnStart?: boolean;           // Default: true
  enqueue?: EnqueueScan;
}

const enqueueToQueue: EnqueueScan = (job) =>
  addJob(QUEUE_NAMES.CONSENSUS_SCAN, `scan-${job.trigger}`, job, PRIORITIES.BACKGROUND);

/**
 * Periodic scan trigger. Each tick enqueues a scan job; the single-concurrency
 * scan worker runs them one at a time.
 */
export class ScanScheduler {
  private isRunning: boolean = false;
  private intervalId?: NodeJS.Timeout;
  private options: Required<Omit<ScanSchedulerOptions, 'params'>> & { params: Partial<ScanParams> };
  private enqueuedCount = 0;

  constructor(options?: ScanSchedulerOptions) {
    this.options = {
      intervalMs: options?.intervalMs ?? 15 * 60_000,
      params: options?.params ?? {},
      runOnStart: options?.runOnStart ?? true,
      enqueue: options?.enqueue ?? enqueueToQueue,
    };
  }

  /**
   * Start the scheduler
   */
  start(): void {
    if (this.isRunning) {
      logger.warn('ScanScheduler is already running');
      return;
    }

    this.isRunning = true;

    this.intervalId = setInterval(() => {
      this.trigger('schedule').catch(err => {
        logger.error('Scheduled scan enqueue failed', { error: (err as Error).message });
      });
    }, this.options.intervalMs);

    if (this.options.runOnStart) {
      this.trigger('startup').catch(err => {
        logger.error('Startup scan enqueue failed', { error: (err as Error).message });
      });
    }

    logger.info('ScanScheduler started', {
      intervalMs: this.options.intervalMs,
      params: this.options.params,
    });
  }

  /**
   * Stop the scheduler
   */
  stop(): void {
    this.isRunning = false;

    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = undefined;
    }

    logger.info('ScanScheduler stopped');
  }

  /**
   * Enqueue one scan now
   */
  async trigger(trigger: ScanJob['trigger'] = 'manual'): Promise<void> {
    await this.options.enqueue({
      params: this.options.params,
      trigger,
      requestedAt: new Date().toISOString(),
    });
    this.enqueuedCount++;
    logger.debug('Scan enqueued', { trigger, total: this.enqueuedCount });
  }

  getStats(): { isRunning: boolean; intervalMs: number; enqueued: number } {
    return {
      isRunning: this.isRunning,
      intervalMs: this.options.intervalMs,
      enqueued: this.enqueuedCount,
    };
  }
}

export default ScanScheduler;
