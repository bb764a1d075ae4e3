import { createClient, RedisClientType } from 'redis';
import { config } from './index.js';
import { logger } from '../utils/logger.js';
import type { ResponseCache } from '../services/external/ProviderClient.js';

export type RedisClient = RedisClientType;

let redisClient: RedisClient | null = null;

export async function connectRedis(): Promise<RedisClient> {
  if (redisClient && redisClient.isOpen) {
    return redisClient;
  }

  redisClient = createClient({
    url: config.redisUrl,
    socket: {
      reconnectStrategy: (retries) => {
        if (retries > 10) {
          logger.error('Redis max reconnection attempts reached');
          return new Error('Max reconnection attempts reached');
        }
        const delay = Math.min(retries * 100, 3000);
        logger.warn(`Redis reconnecting in ${delay}ms`, { attempt: retries });
        return delay;
      },
    },
  });

  redisClient.on('connect', () => {
    logger.info('Redis client connected');
  });

  redisClient.on('error', (err: Error) => {
    logger.error('Redis client error', { error: err.message });
  });

  redisClient.on('reconnecting', () => {
    logger.warn('Redis client reconnecting');
  });

  await redisClient.connect();
  return redisClient;
}

export async function disconnectRedis(): Promise<void> {
  if (redisClient && redisClient.isOpen) {
    await redisClient.quit();
    logger.info('Redis connection closed');
  }
  redisClient = null;
}

export function getRedisClient(): RedisClient {
  if (!redisClient || !redisClient.isOpen) {
    throw new Error('Redis client is not connected. Call connectRedis() first.');
  }
  return redisClient;
}

/**
 * The subset of Redis string commands the response cache needs
 */
export interface CacheStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  setEx(key: string, seconds: number, value: string): Promise<unknown>;
  del(key: string): Promise<unknown>;
}

export const PROVIDER_CACHE_PREFIX = 'holder-consensus:provider:';

/**
 * Provider response cache on Redis. Keys are namespaced under one prefix so
 * they can be flushed without touching the BullMQ keys; an entry that no
 * longer decodes is dropped and reported as a miss.
 */
export class RedisResponseCache implements ResponseCache {
  constructor(
    private store: CacheStore,
    private prefix: string = PROVIDER_CACHE_PREFIX
  ) {}

  async get(key: string): Promise<unknown> {
    const namespaced = this.prefix + key;
    const data = await this.store.get(namespaced);
    if (data === null) {
      return null;
    }

    try {
      const value: unknown = JSON.parse(data);
      return value;
    } catch (error) {
      logger.warn('Dropping unreadable cache entry', {
        key: namespaced,
        error: (error as Error).message,
      });
      await this.store.del(namespaced);
      return null;
    }
  }

  async set(key: string, value: unknown, ttlSeconds?: number): Promise<void> {
    const data: string | undefined = JSON.stringify(value);
    // undefined and functions have no JSON form
    if (data === undefined) {
      return;
    }

    const namespaced = this.prefix + key;
    if (ttlSeconds && ttlSeconds > 0) {
      await this.store.setEx(namespaced, ttlSeconds, data);
    } else {
      await this.store.set(namespaced, data);
    }
  }
}

// Resolves the client per call, so the cache can be built before connecting
const connectedStore: CacheStore = {
  get: (key) => getRedisClient().get(key),
  set: (key, value) => getRedisClient().set(key, value),
  setEx: (key, seconds, value) => getRedisClient().setEx(key, seconds, value),
  del: (key) => getRedisClient().del(key),
};

export const cache = new RedisResponseCache(connectedStore);
