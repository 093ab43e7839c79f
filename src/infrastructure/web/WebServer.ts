import express, { Express, NextFunction, Request, Response } from 'express';
import { Server as HttpServer } from 'http';
import cors from 'cors';
import { z } from 'zod';
import { ChatError, errorMessage } from '../../core/errors.js';
import { Job } from '../../core/entities/Job.js';
import { Logger, silentLogger } from '../../utils/logger.js';
import type { RoomService } from '../../application/services/RoomService.js';
import type { MessagePipeline } from '../../application/services/MessagePipeline.js';
import type { JobService } from '../../application/services/JobService.js';
import type { UserService } from '../../application/services/UserService.js';
import type { CacheService } from '../../application/services/CacheService.js';
import type { IGeneratorClient } from '../../core/interfaces/IGeneratorClient.js';

export const USER_HEADER = 'X-User-Id';

const CreateRoomBody = z.object({
  name: z.string().trim().min(1, 'name is required').max(100),
  description: z.string().max(500).default(''),
});

const CreateUserBody = z.object({
  username: z.string().trim().min(1, 'username is required').max(50),
});

const MAX_MESSAGE_LENGTH = 4000;
const MAX_LIST_LIMIT = 500;

// Content is stored exactly as sent; blank bodies are rejected
const SendMessageBody = z.object({
  content: z
    .string()
    .max(MAX_MESSAGE_LENGTH)
    .refine((content) => content.trim().length > 0, 'content is required'),
});

const MessagesQuery = z.object({
  limit: z.coerce.number().int().min(1).max(MAX_LIST_LIMIT).optional(),
});

const SendQuery = z.object({
  defer: z.enum(['true', 'false']).optional(),
});

const JobsQuery = z.object({
  status: z.enum(['pending', 'running', 'completed', 'failed', 'cancelled']).optional(),
});

const PruneJobsQuery = z.object({
  olderThanHours: z.coerce.number().min(0).default(24),
});

export interface HttpError {
  status: number;
  body: { success: false; error: string; details?: string[] };
}

/**
 * Map anything thrown by a handler to a status and response body. Unknown
 * errors become an opaque 500.
 */
export function toHttpError(error: unknown): HttpError {
  if (error instanceof z.ZodError) {
    return {
      status: 400,
      body: {
        success: false,
        error: 'Invalid request',
        details: error.errors.map((e) => `${e.path.join('.') || 'body'}: ${e.message}`),
      },
    };
  }
  if (error instanceof ChatError) {
    return { status: error.status, body: { success: false, error: error.message } };
  }
  return { status: 500, body: { success: false, error: 'Internal server error' } };
}

export function toJobView(job: Job) {
  return {
    id: job.id,
    type: job.type,
    status: job.status,
    progress: job.progress,
    created_at: job.createdAt.toISOString(),
    started_at: job.startedAt?.toISOString(),
    completed_at: job.completedAt?.toISOString(),
    result: job.result,
    error: job.error,
  };
}

export interface WebServerDeps {
  rooms: RoomService;
  pipeline: MessagePipeline;
  jobs: JobService;
  users: UserService;
  cache: CacheService;
  generator: IGeneratorClient;
  deferReplies: boolean;
  logger?: Logger;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void> | void;

export class WebServer {
  private app: Express;
  private httpServer: HttpServer | null = null;
  private logger: Logger;

  constructor(private deps: WebServerDeps, private port: number = 8000) {
    this.logger = deps.logger ?? silentLogger;
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  getApp(): Express {
    return this.app;
  }

  private setupMiddleware(): void {
    this.app.use(cors());
    this.app.use(express.json());
  }

  /**
   * Route errors, sync or async, through the error middleware
   */
  private route(handler: AsyncHandler) {
    return (req: Request, res: Response, next: NextFunction): void => {
      Promise.resolve()
        .then(() => handler(req, res))
        .catch(next);
    };
  }

  private setupRoutes(): void {
    const { rooms, pipeline, jobs, users, cache, generator } = this.deps;

    this.app.get(
      '/health',
      this.route(async (_req, res) => {
        const cacheHealthy = await cache.isHealthy();
        const generatorHealthy = await generator.healthCheck();
        res.json({
          success: true,
          data: {
            status: 'ok',
            cache: cache.backendName(),
            cacheHealthy,
            generator: { healthy: generatorHealthy, circuit: generator.getCircuitBreakerStats() },
            jobs: jobs.getStatistics(),
          },
        });
      })
    );

    this.app.post(
      '/api/users',
      this.route((req, res) => {
        const body = CreateUserBody.parse(req.body);
        res.status(201).json({ success: true, data: users.register(body.username) });
      })
    );

    this.app.get(
      '/api/rooms',
      this.route(async (_req, res) => {
        res.json({ success: true, data: await rooms.listRooms() });
      })
    );

    this.app.post(
      '/api/rooms',
      this.route(async (req, res) => {
        const user = users.authenticate(req.header(USER_HEADER));
        const body = CreateRoomBody.parse(req.body);
        const room = await rooms.createRoom(body.name, body.description, user.id);
        res.status(201).json({ success: true, message: 'Room created', data: room });
      })
    );

    this.app.delete(
      '/api/rooms',
      this.route(async (req, res) => {
        users.authenticate(req.header(USER_HEADER));
        const deleted = await rooms.deleteAllRooms();
        res.json({ success: true, message: 'Rooms deleted', data: { deleted } });
      })
    );

    this.app.get(
      '/api/rooms/:roomId',
      this.route(async (req, res) => {
        res.json({ success: true, data: await rooms.getRoom(req.params.roomId) });
      })
    );

    this.app.delete(
      '/api/rooms/:roomId',
      this.route(async (req, res) => {
        users.authenticate(req.header(USER_HEADER));
        await rooms.deleteRoom(req.params.roomId);
        res.json({ success: true, message: 'Room deleted' });
      })
    );

    this.app.get(
      '/api/rooms/:roomId/messages',
      this.route(async (req, res) => {
        const query = MessagesQuery.parse(req.query);
        const messages = await rooms.listRoomMessages(req.params.roomId, query.limit);
        res.json({ success: true, data: messages });
      })
    );

    this.app.post(
      '/api/rooms/:roomId/messages',
      this.route(async (req, res) => {
        const user = users.authenticate(req.header(USER_HEADER));
        const body = SendMessageBody.parse(req.body);
        const query = SendQuery.parse(req.query);
        const defer = query.defer === undefined ? this.deps.deferReplies : query.defer === 'true';

        if (defer) {
          const result = await pipeline.sendMessageDeferred(req.params.roomId, user.id, body.content);
          res.status(202).json({ success: true, message: 'Reply queued', data: result });
          return;
        }

        const result = await pipeline.sendMessage(req.params.roomId, user.id, body.content);
        res.status(201).json({ success: true, data: result });
      })
    );

    this.app.get(
      '/api/jobs',
      this.route((req, res) => {
        const query = JobsQuery.parse(req.query);
        res.json({ success: true, data: jobs.listJobs(query.status).map(toJobView) });
      })
    );

    this.app.delete(
      '/api/jobs',
      this.route((req, res) => {
        users.authenticate(req.header(USER_HEADER));
        const query = PruneJobsQuery.parse(req.query);
        const cleared = jobs.clearOldJobs(query.olderThanHours);
        res.json({ success: true, message: 'Old jobs pruned', data: { cleared } });
      })
    );

    this.app.get(
      '/api/jobs/:id',
      this.route((req, res) => {
        const job = jobs.getJob(req.params.id);
        if (!job) {
          res.status(404).json({ success: false, error: 'Job not found' });
          return;
        }
        res.json({ success: true, data: toJobView(job) });
      })
    );

    this.app.post(
      '/api/jobs/:id/cancel',
      this.route((req, res) => {
        if (!jobs.cancelJob(req.params.id)) {
          res.status(409).json({ success: false, error: 'Job is not pending or running' });
          return;
        }
        res.json({ success: true, message: 'Job cancelled' });
      })
    );

    // Four parameters mark this as express error middleware
    this.app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
      const mapped = toHttpError(error);
      if (mapped.status >= 500) {
        this.logger.error(`${req.method} ${req.path} failed: ${errorMessage(error)}`);
      }
      res.status(mapped.status).json(mapped.body);
    });
  }

  public start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.port, () => {
        this.logger.info(`API available at http://localhost:${this.port}`);
        resolve();
      });
      server.on('error', (error) => {
        this.logger.error(`Server error: ${errorMessage(error)}`);
        reject(error);
      });
      this.httpServer = server;
    });
  }

  public stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.httpServer;
      if (!server) {
        resolve();
        return;
      }
      this.httpServer = null;
      server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        this.logger.info('HTTP server closed');
        resolve();
      });
    });
  }
}
