import { Server } from 'http';
import { config, validateConfig, isSchedulerEnabled } from './config/index.js';
import { connectRedis, disconnectRedis, cache } from './config/redis.js';
import { logger } from './utils/logger.js';
import { HttpConsensusProvider } from './services/external/index.js';
import { ConsensusEngine } from './services/scan/ConsensusEngine.js';
import { ScanScheduler } from './services/scheduler/ScanScheduler.js';
import {
  closeAllQueues,
  getQueueEvents,
  getQueueStats,
  startScanWorker,
  stopScanWorker,
  QUEUE_NAMES,
} from './services/queue/index.js';
import { createApp, startApiServer, stopApiServer } from './api/server.js';
import {
  DEFAULT_SCAN_PARAMS,
  ScanParams,
  isDiscoveryMode,
  isSourceMode,
} from './types/index.js';

// Track running services for cleanup
let server: Server | null = null;
let scheduler: ScanScheduler | null = null;
let redisConnected = false;

/**
 * Scan defaults from the environment
 */
function configuredScanParams(): Partial<ScanParams> {
  const { discoveryMode, sourceMode, numTraders, minHolders } = config.scan;

  if (!isDiscoveryMode(discoveryMode)) {
    logger.warn('Unknown SCAN_DISCOVERY_MODE, using default', { discoveryMode });
  }
  if (!isSourceMode(sourceMode)) {
    logger.warn('Unknown SCAN_SOURCE_MODE, using default', { sourceMode });
  }

  return {
    discoveryMode: isDiscoveryMode(discoveryMode) ? discoveryMode : DEFAULT_SCAN_PARAMS.discoveryMode,
    sourceMode: isSourceMode(sourceMode) ? sourceMode : DEFAULT_SCAN_PARAMS.sourceMode,
    subjectLimit: numTraders,
    minHolders,
  };
}

async function tryConnectRedis(): Promise<boolean> {
  try {
    await connectRedis();
    return true;
  } catch (error) {
    logger.warn('Redis unavailable - response cache and scheduled scans disabled', {
      error: (error as Error).message,
    });
    return false;
  }
}

async function bootstrap(): Promise<void> {
  logger.info('Starting holder consensus service...', {
    env: config.nodeEnv,
    scheduler: isSchedulerEnabled(),
  });

  try {
    validateConfig();

    const needsRedis = config.cacheEnabled || isSchedulerEnabled();
    redisConnected = needsRedis ? await tryConnectRedis() : false;

    const provider = new HttpConsensusProvider({
      cache: redisConnected && config.cacheEnabled ? cache : undefined,
    });

    logger.info('External service status', provider.getStatus());

    const engine = new ConsensusEngine({ provider });
    const scanDefaults = configuredScanParams();

    const app = createApp({
      engine,
      providerStatus: () => provider.getStatus(),
      queueStats: isSchedulerEnabled() && redisConnected
        ? () => getQueueStats(QUEUE_NAMES.CONSENSUS_SCAN)
        : undefined,
      defaults: scanDefaults,
    });
    server = await startApiServer(app, config.port);

    if (isSchedulerEnabled() && redisConnected) {
      startScanWorker(engine);
      getQueueEvents(QUEUE_NAMES.CONSENSUS_SCAN);

      scheduler = new ScanScheduler({
        intervalMs: config.scan.intervalMinutes * 60_000,
        params: scanDefaults,
      });
      scheduler.start();
    }

    logger.info(`Server running in ${config.nodeEnv} mode`);
  } catch (error) {
    logger.error('Failed to start application', { error: (error as Error).message });
    await shutdown();
    process.exit(1);
  }
}

async function shutdown(): Promise<void> {
  logger.info('Shutting down...');

  scheduler?.stop();
  scheduler = null;

  try {
    await stopScanWorker();
    await closeAllQueues();

    if (server) {
      await stopApiServer(server);
      server = null;
    }

    if (redisConnected) {
      await disconnectRedis();
      redisConnected = false;
    }
  } catch (error) {
    logger.error('Error during shutdown', { error: (error as Error).message });
  }
}

function onSignal(signal: string): void {
  logger.info(`${signal} received`);
  shutdown()
    .then(() => process.exit(0))
    .catch(() => process.exit(1));
}

process.on('SIGINT', () => onSignal('SIGINT'));
process.on('SIGTERM', () => onSignal('SIGTERM'));

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', { reason: String(reason) });
});

bootstrap().catch((error: Error) => {
  logger.error('Bootstrap failed', { error: error.message });
  process.exit(1);
});
