// Queue management
export {
  getQueue,
  getQueueEvents,
  addJob,
  getQueueStats,
  closeAllQueues,
  QUEUE_NAMES,
  PRIORITIES,
  connection,
} from './QueueManager.js';

export type { QueueName, Priority, QueueStats, ScanJob } from './QueueManager.js';

// Workers
export {
  createScanProcessor,
  startScanWorker,
  stopScanWorker,
} from './workers/ScanWorker.js';

export type { ScanJobResult } from './workers/ScanWorker.js';
