import { ICacheClient } from '../../core/interfaces/ICacheClient.js';

/**
 * Stands in when no cache backend is reachable: every read misses
 */
export class NullCacheClient implements ICacheClient {
  readonly name = 'none';

  async get(): Promise<string | null> {
    return null;
  }

  async set(): Promise<void> {}

  async delete(): Promise<void> {}

  async ping(): Promise<boolean> {
    return false;
  }

  async close(): Promise<void> {}
}
