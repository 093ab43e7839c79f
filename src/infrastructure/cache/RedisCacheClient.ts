import Redis from 'ioredis';
import { ICacheClient } from '../../core/interfaces/ICacheClient.js';

/**
 * Cache backend on a Redis server
 */
export class RedisCacheClient implements ICacheClient {
  readonly name = 'redis';

  constructor(private redis: Redis) {}

  get(key: string): Promise<string | null> {
    return this.redis.get(key);
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.redis.set(key, value, 'EX', ttlSeconds);
  }

  async delete(key: string): Promise<void> {
    await this.redis.del(key);
  }

  async ping(): Promise<boolean> {
    return (await this.redis.ping()) === 'PONG';
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}
