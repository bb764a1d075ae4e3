import { Queue, QueueEvents, Job, ConnectionOptions } from 'bullmq';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import type { ScanParams } from '../../types/index.js';

// Redis connection for BullMQ
const redisUrl = new URL(config.redisUrl);
const connection: ConnectionOptions = {
  host: redisUrl.hostname,
  port: parseInt(redisUrl.port || '6379', 10),
  ...(redisUrl.password ? { password: decodeURIComponent(redisUrl.password) } : {}),
};

// Queue names
export const QUEUE_NAMES = {
  CONSENSUS_SCAN: 'consensus-scan',
} as const;

export type QueueName = (typeof QUEUE_NAMES)[keyof typeof QUEUE_NAMES];

// Job priorities (lower = higher priority)
export const PRIORITIES = {
  HIGH: 1,
  NORMAL: 3,
  BACKGROUND: 5,
} as const;

export type Priority = (typeof PRIORITIES)[keyof typeof PRIORITIES];

// Job types
export interface ScanJob {
  params: Partial<ScanParams>;
  trigger: 'schedule' | 'startup' | 'manual';
  requestedAt: string;
}

// Scans are not retried: the next interval runs a fresh one
const DEFAULT_JOB_OPTIONS = {
  attempts: 1,
  removeOnComplete: {
    age: 3600, // 1 hour
    count: 100,
  },
  removeOnFail: {
    age: 24 * 3600, // 24 hours
  },
};

// Queue instances
const queues: Map<QueueName, Queue> = new Map();
const queueEvents: Map<QueueName, QueueEvents> = new Map();

/**
 * Get or create a queue
 */
export function getQueue(name: QueueName): Queue {
  let queue = queues.get(name);

  if (!queue) {
    queue = new Queue(name, {
      connection,
      defaultJobOptions: DEFAULT_JOB_OPTIONS,
    });

    queue.on('error', (error) => {
      logger.error(`Queue ${name} error`, { error: error.message });
    });

    queues.set(name, queue);
    logger.info(`Queue ${name} initialized`);
  }

  return queue;
}

/**
 * Get queue events for monitoring
 */
export function getQueueEvents(name: QueueName): QueueEvents {
  let events = queueEvents.get(name);

  if (!events) {
    events = new QueueEvents(name, { connection });

    events.on('failed', ({ jobId, failedReason }) => {
      logger.error(`Job ${jobId} failed in queue ${name}`, { reason: failedReason });
    });

    events.on('stalled', ({ jobId }) => {
      logger.warn(`Job ${jobId} stalled in queue ${name}`);
    });

    queueEvents.set(name, events);
  }

  return events;
}

/**
 * Add a job to a queue
 */
export async function addJob<T>(
  queueName: QueueName,
  jobName: string,
  data: T,
  priority: Priority = PRIORITIES.NORMAL
): Promise<Job<T>> {
  const queue = getQueue(queueName);

  const job = await queue.add(jobName, data, {
    priority,
  });

  logger.debug(`Job ${job.id} added to queue ${queueName}`, {
    jobName,
    priority,
  });

  return job;
}

export interface QueueStats {
  queueName: QueueName;
  waiting: number;
  active: number;
  completed: number;
  failed: number;
}

/**
 * Get queue statistics
 */
export async function getQueueStats(queueName: QueueName): Promise<QueueStats> {
  const queue = getQueue(queueName);

  const [waiting, active, completed, failed] = await Promise.all([
    queue.getWaitingCount(),
    queue.getActiveCount(),
    queue.getCompletedCount(),
    queue.getFailedCount(),
  ]);

  return {
    queueName,
    waiting,
    active,
    completed,
    failed,
  };
}

/**
 * Close all queues
 */
export async function closeAllQueues(): Promise<void> {
  const closePromises: Promise<void>[] = [];

  for (const [name, queue] of queues) {
    closePromises.push(
      queue.close().then(() => {
        logger.info(`Queue ${name} closed`);
      })
    );
  }

  for (const [name, events] of queueEvents) {
    closePromises.push(
      events.close().then(() => {
        logger.debug(`Queue events ${name} closed`);
      })
    );
  }

  await Promise.all(closePromises);

  queues.clear();
  queueEvents.clear();

  logger.info('All queues closed');
}

export { connection };
