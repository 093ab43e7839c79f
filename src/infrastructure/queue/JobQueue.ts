import { randomUUID } from 'crypto';
import { IJobRepository } from '../../core/interfaces/IJobRepository.js';
import { Job, JobStatus, JobType, isFinished } from '../../core/entities/Job.js';
import { errorMessage } from '../../core/errors.js';
import { Logger, silentLogger } from '../../utils/logger.js';

export type JobHandler = (job: Job) => void | Promise<void>;

export interface QueueStatistics {
  total: number;
  pending: number;
  running: number;
  completed: number;
  failed: number;
  cancelled: number;
  maxConcurrent: number;
}

/**
 * In-process job queue with bounded concurrency.
 *
 * Jobs are mirrored to the repository on every state change so that a restart
 * can find the ones left pending or running. Execution is delegated to the
 * started handler, which must finish each job with `completeJob` or `failJob`.
 */
export class JobQueue {
  private pending: Job[] = [];
  private running: Map<string, Job> = new Map();
  private finished: Map<string, Job> = new Map();
  private idleWaiters: Array<() => void> = [];
  private startedHandler?: JobHandler;

  constructor(
    private maxConcurrent: number = 2,
    private jobRepo?: IJobRepository,
    private logger: Logger = silentLogger
  ) {
    if (maxConcurrent < 1) {
      throw new Error(`maxConcurrent must be at least 1, got ${maxConcurrent}`);
    }
    this.loadFinishedJobs();
  }

  private loadFinishedJobs(): void {
    if (!this.jobRepo) return;

    try {
      for (const job of this.jobRepo.getAllJobs()) {
        if (isFinished(job.status)) {
          this.finished.set(job.id, job);
        }
      }
      this.logger.info(`Loaded ${this.finished.size} finished jobs from database`);
    } catch (error) {
      this.logger.error(`Error loading jobs from database: ${errorMessage(error)}`);
    }
  }

  /**
   * Register the executor. Jobs submitted before a handler exists wait in the
   * pending list.
   */
  onJobStarted(handler: JobHandler): void {
    this.startedHandler = handler;
    this.processQueue();
  }

  submitJob(type: JobType, input: Record<string, unknown>): string {
    const job: Job = {
      id: randomUUID(),
      type,
      status: 'pending',
      progress: 0,
      createdAt: new Date(),
      input,
      progressUpdates: [],
    };

    this.pending.push(job);
    this.persist(job);
    this.logger.debug(`Job ${job.id} submitted (${type})`);

    this.processQueue();
    return job.id;
  }

  getJob(jobId: string): Job | null {
    const inMemory =
      this.running.get(jobId) ??
      this.finished.get(jobId) ??
      this.pending.find((j) => j.id === jobId);
    if (inMemory) {
      return inMemory;
    }

    // Jobs finished in an earlier process only live in the database
    if (!this.jobRepo) {
      return null;
    }
    try {
      const stored = this.jobRepo.loadJob(jobId);
      if (stored && isFinished(stored.status)) {
        this.finished.set(jobId, stored);
      }
      return stored;
    } catch (error) {
      this.logger.error(`Error loading job ${jobId} from database: ${errorMessage(error)}`);
      return null;
    }
  }

  updateProgress(jobId: string, progress: number, message: string): void {
    const job = this.running.get(jobId);
    if (!job) return;

    const timestamp = new Date();
    job.progress = Math.min(100, Math.max(0, progress));
    job.progressUpdates.push({ timestamp, message, percentage: job.progress });

    if (this.jobRepo) {
      try {
        this.jobRepo.saveJob(job);
        this.jobRepo.saveJobProgress(jobId, timestamp, message, job.progress);
      } catch (error) {
        this.logger.warn(`Failed to persist progress for job ${jobId}: ${errorMessage(error)}`);
      }
    }
  }

  completeJob(jobId: string, result: unknown): void {
    this.finish(jobId, (job) => {
      job.status = 'completed';
      job.progress = 100;
      job.result = result;
    });
  }

  failJob(jobId: string, error: string): void {
    this.finish(jobId, (job) => {
      job.status = 'failed';
      job.error = error;
    });
  }

  /**
   * Pending jobs are dropped from the queue. A running job cannot be
   * interrupted; it is marked cancelled and its outcome is discarded.
   */
  cancelJob(jobId: string): boolean {
    const pendingIndex = this.pending.findIndex((j) => j.id === jobId);
    if (pendingIndex !== -1) {
      const [job] = this.pending.splice(pendingIndex, 1);
      job.status = 'cancelled';
      job.completedAt = new Date();
      this.finished.set(jobId, job);
      this.persist(job);
      this.notifyIfIdle();
      return true;
    }

    const runningJob = this.running.get(jobId);
    if (runningJob && runningJob.status === 'running') {
      runningJob.status = 'cancelled';
      this.persist(runningJob);
      return true;
    }

    return false;
  }

  getJobsByStatus(status: JobStatus): Job[] {
    return this.getAllJobs().filter((j) => j.status === status);
  }

  getAllJobs(): Job[] {
    return [...this.pending, ...this.running.values(), ...this.finished.values()];
  }

  getStatistics(): QueueStatistics {
    const finished = Array.from(this.finished.values());
    const count = (status: JobStatus) => finished.filter((j) => j.status === status).length;
    return {
      total: this.pending.length + this.running.size + finished.length,
      pending: this.pending.length,
      running: this.running.size,
      completed: count('completed'),
      failed: count('failed'),
      cancelled: count('cancelled'),
      maxConcurrent: this.maxConcurrent,
    };
  }

  /**
   * Drop finished jobs older than `hoursOld`, in memory and in the database
   */
  clearOldJobs(hoursOld: number = 24): number {
    const cutoff = Date.now() - hoursOld * 60 * 60 * 1000;
    let cleared = 0;

    for (const [jobId, job] of this.finished.entries()) {
      if (job.completedAt && job.completedAt.getTime() < cutoff) {
        this.finished.delete(jobId);
        cleared++;
      }
    }

    if (this.jobRepo) {
      try {
        cleared = Math.max(cleared, this.jobRepo.deleteJobsByAge(hoursOld));
      } catch (error) {
        this.logger.error(`Failed to delete old jobs: ${errorMessage(error)}`);
      }
    }

    return cleared;
  }

  /**
   * Resolves once nothing is pending or running
   */
  whenIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private isIdle(): boolean {
    const waiting = this.startedHandler ? this.pending.length : 0;
    return waiting === 0 && this.running.size === 0;
  }

  private finish(jobId: string, apply: (job: Job) => void): void {
    const job = this.running.get(jobId);
    if (!job) return;

    // A job cancelled while running keeps that status
    if (job.status !== 'cancelled') {
      apply(job);
    }
    job.completedAt = new Date();
    this.running.delete(jobId);
    this.finished.set(jobId, job);
    this.persist(job);
    this.logger.debug(`Job ${jobId} finished (${job.status})`);

    this.processQueue();
    this.notifyIfIdle();
  }

  private processQueue(): void {
    const handler = this.startedHandler;
    if (!handler) return;

    while (this.pending.length > 0 && this.running.size < this.maxConcurrent) {
      const job = this.pending.shift();
      if (!job) break;

      job.status = 'running';
      job.startedAt = new Date();
      this.running.set(job.id, job);
      this.persist(job);

      this.dispatch(() => handler(job), (error) => this.failJob(job.id, errorMessage(error)));
    }
  }

  /**
   * Run a handler off the caller's stack; a throw or rejection goes to `onError`
   */
  private dispatch(run: () => void | Promise<void>, onError: (error: unknown) => void): void {
    queueMicrotask(() => {
      void Promise.resolve()
        .then(run)
        .catch(onError);
    });
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }

  private persist(job: Job): void {
    if (!this.jobRepo) return;
    try {
      this.jobRepo.saveJob(job);
    } catch (error) {
      this.logger.error(
        `Failed to persist job ${job.id} to database (${job.status}): ${errorMessage(error)}`
      );
    }
  }
}
