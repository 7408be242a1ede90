/**
 * Redis Client Setup
 *
 * Only the batch lock uses Redis. Without REDIS_URL the lock stays in-process,
 * which is fine for a single importer but not for several workers.
 */

import { Redis } from 'ioredis';
import { getConfig } from './config.js';
import { logger } from './logger.js';

let client: Redis | null = null;
let isConnected = false;
let connectionError: Error | null = null;

/**
 * Create a lazily connecting client with the retry policy used everywhere
 */
export function createRedisClient(url: string): Redis {
  const redis = new Redis(url, {
    maxRetriesPerRequest: 3,
    retryStrategy(times) {
      const delay = Math.min(times * 50, 2000);
      return delay;
    },
    lazyConnect: true,
  });

  redis.on('connect', () => {
    isConnected = true;
    connectionError = null;
    logger.info('Redis connected');
  });

  redis.on('error', (err: Error) => {
    isConnected = false;
    connectionError = err;
    logger.error('Redis error', { error: err.message });
  });

  redis.on('close', () => {
    isConnected = false;
    logger.warn('Redis connection closed');
  });

  return redis;
}

/**
 * Shared client, or null when REDIS_URL is not configured
 */
export function getRedis(): Redis | null {
  const { REDIS_URL } = getConfig();
  if (!REDIS_URL) return null;
  if (!client) {
    client = createRedisClient(REDIS_URL);
  }
  return client;
}

export function checkRedisHealth(): { ok: boolean; status: string; error?: string } {
  if (!client) {
    return getConfig().REDIS_URL
      ? { ok: true, status: 'idle' }
      : { ok: true, status: 'disabled' };
  }

  if (!isConnected) {
    return {
      ok: false,
      status: 'disconnected',
      error: connectionError?.message || 'Not connected',
    };
  }

  return { ok: true, status: 'connected' };
}

/**
 * Graceful shutdown
 */
export async function closeRedis(): Promise<void> {
  if (client) {
    const closing = client;
    client = null;
    await closing.quit();
  }
}
