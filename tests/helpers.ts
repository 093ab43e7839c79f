import { DatabaseConnection, IN_MEMORY } from '../src/infrastructure/database/DatabaseConnection.js';
import { RoomRepository } from '../src/infrastructure/database/repositories/RoomRepository.js';
import { MessageRepository } from '../src/infrastructure/database/repositories/MessageRepository.js';
import { UserRepository } from '../src/infrastructure/database/repositories/UserRepository.js';
import { JobRepository } from '../src/infrastructure/database/repositories/JobRepository.js';
import { MemoryCacheClient } from '../src/infrastructure/cache/MemoryCacheClient.js';
import { ICacheClient } from '../src/core/interfaces/ICacheClient.js';
import { CacheService } from '../src/application/services/CacheService.js';

/**
 * Clock advancing one second per reading, from a fixed start
 */
export function steppingClock(start = '2024-01-01T00:00:00.000Z'): () => Date {
  let tick = 0;
  const base = new Date(start).getTime();
  return () => new Date(base + 1000 * tick++);
}

/**
 * Cache backend whose every call rejects, as an unreachable server would
 */
export class FailingCacheClient implements ICacheClient {
  readonly name = 'failing';
  calls: string[] = [];

  async get(key: string): Promise<string | null> {
    this.calls.push(`get ${key}`);
    throw new Error('cache down');
  }

  async set(key: string): Promise<void> {
    this.calls.push(`set ${key}`);
    throw new Error('cache down');
  }

  async delete(key: string): Promise<void> {
    this.calls.push(`delete ${key}`);
    throw new Error('cache down');
  }

  async ping(): Promise<boolean> {
    throw new Error('cache down');
  }

  async close(): Promise<void> {}
}

export interface TestContext {
  connection: DatabaseConnection;
  rooms: RoomRepository;
  messages: MessageRepository;
  users: UserRepository;
  jobs: JobRepository;
  cacheClient: ICacheClient;
  cache: CacheService;
}

export function createTestContext(cacheClient: ICacheClient = new MemoryCacheClient()): TestContext {
  const connection = new DatabaseConnection(IN_MEMORY);
  const db = connection.getDatabase();
  return {
    connection,
    rooms: new RoomRepository(db, steppingClock()),
    messages: new MessageRepository(db, steppingClock()),
    users: new UserRepository(db),
    jobs: new JobRepository(db),
    cacheClient,
    cache: new CacheService(cacheClient, 60),
  };
}
