import { Worker, Job } from 'bullmq';
import { logger } from '../../../utils/logger.js';
import { connection, QUEUE_NAMES, ScanJob } from '../QueueManager.js';
import type { ConsensusEngine } from '../../scan/ConsensusEngine.js';

export interface ScanJobResult {
  flagged: number;
  topTokens: string[];
}

let worker: Worker<ScanJob, ScanJobResult> | null = null;

/**
 * Build the processor for scan jobs against one engine
 */
export function createScanProcessor(engine: ConsensusEngine) {
  return async (job: Pick<Job<ScanJob>, 'id' | 'data'>): Promise<ScanJobResult> => {
    const { params, trigger } = job.data;

    logger.info(`Running ${trigger} consensus scan`, {
      jobId: job.id,
      requestedAt: job.data.requestedAt,
    });

    try {
      const flagged = await engine.runScan(params);
      return {
        flagged: flagged.length,
        topTokens: flagged.slice(0, 10).map(entry => entry.resourceId),
      };
    } catch (error) {
      logger.error('Consensus scan job failed', {
        jobId: job.id,
        error: (error as Error).message,
      });
      throw error;
    }
  };
}

/**
 * Start the scan worker. Concurrency stays at 1: scans must not overlap.
 */
export function startScanWorker(engine: ConsensusEngine): Worker<ScanJob, ScanJobResult> {
  if (worker) {
    return worker;
  }

  worker = new Worker<ScanJob, ScanJobResult>(
    QUEUE_NAMES.CONSENSUS_SCAN,
    createScanProcessor(engine),
    {
      connection,
      concurrency: 1,
    }
  );

  worker.on('completed', (job, result) => {
    logger.info(`Scan job ${job.id} completed`, { flagged: result.flagged });
  });

  worker.on('failed', (job, error) => {
    logger.error(`Scan job ${job?.id} failed`, { error: error.message });
  });

  worker.on('error', (error) => {
    logger.error('Scan worker error', { error: error.message });
  });

  logger.info('Scan worker started');

  return worker;
}

/**
 * Stop the scan worker
 */
export async function stopScanWorker(): Promise<void> {
  if (worker) {
    await worker.close();
    worker = null;
    logger.info('Scan worker stopped');
  }
}
