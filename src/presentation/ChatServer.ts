import { Config } from '../config.js';
import { DatabaseConnection } from '../infrastructure/database/DatabaseConnection.js';
import { RoomRepository } from '../infrastructure/database/repositories/RoomRepository.js';
import { MessageRepository } from '../infrastructure/database/repositories/MessageRepository.js';
import { UserRepository } from '../infrastructure/database/repositories/UserRepository.js';
import { JobRepository } from '../infrastructure/database/repositories/JobRepository.js';
import { createCacheClient } from '../infrastructure/cache/createCacheClient.js';
import { GeminiApiClient } from '../infrastructure/http/GeminiApiClient.js';
import { JobQueue } from '../infrastructure/queue/JobQueue.js';
import { WebServer } from '../infrastructure/web/WebServer.js';
import { ICacheClient } from '../core/interfaces/ICacheClient.js';
import { CacheService } from '../application/services/CacheService.js';
import { ContextWindowBuilder } from '../application/services/ContextWindowBuilder.js';
import { RoomService } from '../application/services/RoomService.js';
import { MessagePipeline } from '../application/services/MessagePipeline.js';
import { JobService } from '../application/services/JobService.js';
import { UserService } from '../application/services/UserService.js';
import { ReplyWorker } from '../application/workers/ReplyWorker.js';
import { CircuitBreaker } from '../utils/retry.js';
import { createLogger, Logger } from '../utils/logger.js';
import { errorMessage } from '../core/errors.js';

interface Components {
  db: DatabaseConnection;
  cacheClient: ICacheClient;
  jobs: JobService;
  web: WebServer;
}

/**
 * Wires storage, cache, generator, queue and HTTP surface together
 */
export class ChatServer {
  private components: Components | null = null;
  private logger: Logger;

  constructor(private config: Config) {
    this.logger = createLogger('ChatServer', config.server.debug);
  }

  async start(): Promise<void> {
    const { config } = this;
    const debug = config.server.debug;

    const db = new DatabaseConnection(config.database.path);
    const sqlite = db.getDatabase();
    const roomRepo = new RoomRepository(sqlite);
    const messageRepo = new MessageRepository(sqlite);
    const userRepo = new UserRepository(sqlite);
    const jobRepo = new JobRepository(sqlite);

    const cacheClient = await createCacheClient(
      { driver: config.cache.driver, url: config.cache.url },
      createLogger('Cache', debug)
    );
    const cache = new CacheService(cacheClient, config.cache.ttlSeconds, createLogger('Cache', debug));

    const generator = new GeminiApiClient(
      {
        apiUrl: config.generator.apiUrl,
        apiKey: config.generator.apiKey,
        timeoutMs: config.generator.timeoutMs,
        temperature: config.generator.temperature,
        maxOutputTokens: config.generator.maxOutputTokens,
        historyLimit: config.chat.historyLimit,
        retryAttempts: config.generator.retryAttempts,
      },
      { circuitBreaker: new CircuitBreaker(5, 60000), logger: createLogger('Generator', debug) }
    );

    const jobQueue = new JobQueue(
      config.jobQueue.maxConcurrentJobs,
      jobRepo,
      createLogger('JobQueue', debug)
    );
    const jobs = new JobService(jobQueue, jobRepo, createLogger('JobService', debug));

    const windowBuilder = new ContextWindowBuilder(
      messageRepo,
      userRepo,
      cache,
      config.chat.displayLimit
    );
    const rooms = new RoomService(
      roomRepo,
      messageRepo,
      userRepo,
      cache,
      { displayLimit: config.chat.displayLimit, previewLimit: 10 },
      createLogger('Rooms', debug)
    );
    const pipeline = new MessagePipeline(
      {
        rooms: roomRepo,
        messages: messageRepo,
        users: userRepo,
        cache,
        windowBuilder,
        generator,
        scheduler: jobs,
        logger: createLogger('Pipeline', debug),
      },
      { contextLimit: config.chat.contextLimit, aiUserId: config.chat.aiUserId }
    );

    new ReplyWorker(pipeline, jobs, createLogger('ReplyWorker', debug)).attach();
    const restored = jobs.restoreIncompleteJobs();
    if (restored.length > 0) {
      this.logger.info(`Resubmitted ${restored.length} reply job(s)`);
    }
    jobs.clearOldJobs(config.jobQueue.retentionHours);

    const web = new WebServer(
      {
        rooms,
        pipeline,
        jobs,
        users: new UserService(userRepo),
        cache,
        generator,
        deferReplies: config.chat.deferReplies,
        logger: createLogger('WebServer', debug),
      },
      config.server.port
    );

    this.components = { db, cacheClient, jobs, web };
    await web.start();
  }

  printStats(): void {
    if (!this.components) return;
    const stats = this.components.db.getStatistics();
    this.logger.info(
      `Database: ${stats.totalRooms} rooms, ${stats.totalMessages} messages, ${stats.databaseSize} bytes`
    );
  }

  /**
   * Stop accepting requests, let running replies finish, then release the
   * cache connection and the database
   */
  async shutdown(): Promise<void> {
    const components = this.components;
    if (!components) return;
    this.components = null;

    await components.web.stop();
    await components.jobs.whenIdle();
    try {
      await components.cacheClient.close();
    } catch (error) {
      this.logger.warn(`Cache close failed: ${errorMessage(error)}`);
    }
    components.db.close();
    this.logger.info('Shutdown complete');
  }
}
