import Redis from 'ioredis';
import { ICacheClient } from '../../core/interfaces/ICacheClient.js';
import { errorMessage } from '../../core/errors.js';
import { Logger } from '../../utils/logger.js';
import { MemoryCacheClient } from './MemoryCacheClient.js';
import { NullCacheClient } from './NullCacheClient.js';
import { RedisCacheClient } from './RedisCacheClient.js';

export type CacheDriver = 'redis' | 'memory' | 'none';

export interface CacheConnectOptions {
  driver: CacheDriver;
  url: string;
}

/**
 * Builds the cache backend. An unreachable Redis at startup is not fatal:
 * the process runs with a cache that always misses.
 */
export async function createCacheClient(
  options: CacheConnectOptions,
  logger: Logger
): Promise<ICacheClient> {
  if (options.driver === 'memory') {
    return new MemoryCacheClient();
  }
  if (options.driver === 'none') {
    return new NullCacheClient();
  }

  const redis = new Redis(options.url, {
    lazyConnect: true,
    enableOfflineQueue: false,
    maxRetriesPerRequest: 1,
  });
  redis.on('error', (error: Error) => {
    logger.debug(`redis error: ${error.message}`);
  });

  try {
    await redis.connect();
    const client = new RedisCacheClient(redis);
    if (!(await client.ping())) {
      throw new Error('PING did not answer PONG');
    }
    logger.info(`✓ Connected to ${redactUrl(options.url)}`);
    return client;
  } catch (error) {
    logger.warn(`✗ Redis unavailable at startup, caching disabled: ${errorMessage(error)}`);
    redis.disconnect();
    return new NullCacheClient();
  }
}

function redactUrl(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.password) {
      parsed.password = '***';
    }
    return parsed.toString();
  } catch {
    return 'redis';
  }
}
