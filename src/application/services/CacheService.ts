import { z } from 'zod';
import { ICacheClient } from '../../core/interfaces/ICacheClient.js';
import { ROOM_LIST_KEY, roomKey, roomMessagesKey } from '../../core/cacheKeys.js';
import { Result, attempt } from '../../core/result.js';
import { errorMessage } from '../../core/errors.js';
import { Logger, silentLogger } from '../../utils/logger.js';

export const DEFAULT_CACHE_TTL_SECONDS = 60;

export type CacheSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface InvalidationOutcome {
  key: string;
  result: Result<void>;
}

/**
 * Cache-aside access to the cache backend.
 *
 * The cache is never a source of truth: backend errors read as misses, and
 * writes or deletions that fail are reported as `Result` values and logged.
 * Write paths must call the `invalidate*` methods only after their store
 * mutation has returned, otherwise a concurrent reader can repopulate the
 * entry with data that predates the write.
 */
export class CacheService {
  constructor(
    private client: ICacheClient,
    private defaultTtlSeconds: number = DEFAULT_CACHE_TTL_SECONDS,
    private logger: Logger = silentLogger
  ) {}

  /**
   * Returns the cached value for `key`, or loads, stores and returns it.
   * Errors thrown by `loader` propagate.
   */
  async getOrLoad<T>(
    key: string,
    loader: () => T | Promise<T>,
    schema: CacheSchema<T>,
    ttlSeconds: number = this.defaultTtlSeconds
  ): Promise<T> {
    const cached = await this.peek(key, schema);
    if (cached !== null) {
      this.logger.debug(`hit ${key}`);
      return cached;
    }

    this.logger.debug(`miss ${key}`);
    const value = await loader();

    const stored = await this.store(key, value, ttlSeconds);
    if (!stored.ok) {
      this.logger.warn(`set ${key} failed: ${stored.error.message}`);
    }

    return value;
  }

  /**
   * Reads without loading or populating. Undecodable entries read as null.
   */
  async peek<T>(key: string, schema: CacheSchema<T>): Promise<T | null> {
    let raw: string | null;
    try {
      raw = await this.client.get(key);
    } catch (error) {
      this.logger.warn(`get ${key} failed: ${errorMessage(error)}`);
      return null;
    }
    if (raw === null) {
      return null;
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch (error) {
      this.logger.warn(`discarding undecodable entry ${key}: ${errorMessage(error)}`);
      return null;
    }

    const parsed = schema.safeParse(decoded);
    if (!parsed.success) {
      this.logger.warn(`discarding entry ${key} with unexpected shape`);
      return null;
    }
    return parsed.data;
  }

  store<T>(key: string, value: T, ttlSeconds: number = this.defaultTtlSeconds): Promise<Result<void>> {
    return attempt(() => this.client.set(key, JSON.stringify(value), ttlSeconds));
  }

  /**
   * Deletes one entry. Deleting an absent key succeeds.
   */
  async invalidate(key: string): Promise<Result<void>> {
    const result = await attempt(() => this.client.delete(key));
    if (result.ok) {
      this.logger.debug(`invalidated ${key}`);
    }
    return result;
  }

  invalidateRoomSet(): Promise<Result<void>> {
    return this.invalidate(ROOM_LIST_KEY);
  }

  /**
   * Drops every entry a change to one room can make stale: the room list,
   * the room view and its message list.
   */
  async invalidateRoom(roomId: string): Promise<InvalidationOutcome[]> {
    const keys = [ROOM_LIST_KEY, roomKey(roomId), roomMessagesKey(roomId)];
    const outcomes: InvalidationOutcome[] = [];
    for (const key of keys) {
      outcomes.push({ key, result: await this.invalidate(key) });
    }
    return outcomes;
  }

  /**
   * Logs failed outcomes of `invalidateRoom`; returns the number of failures
   */
  reportFailures(outcomes: InvalidationOutcome[]): number {
    let failures = 0;
    for (const { key, result } of outcomes) {
      if (!result.ok) {
        failures++;
        this.logger.warn(`invalidate ${key} failed: ${result.error.message}`);
      }
    }
    return failures;
  }

  backendName(): string {
    return this.client.name;
  }

  async isHealthy(): Promise<boolean> {
    const result = await attempt(() => this.client.ping());
    return result.ok ? result.value : false;
  }
}
