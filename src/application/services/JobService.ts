import { JobHandler, JobQueue, QueueStatistics } from '../../infrastructure/queue/JobQueue.js';
import { Job, JobStatus, ReplyJobInput } from '../../core/entities/Job.js';
import { IJobRepository } from '../../core/interfaces/IJobRepository.js';
import { errorMessage } from '../../core/errors.js';
import { Logger, silentLogger } from '../../utils/logger.js';
import { ReplyScheduler } from './MessagePipeline.js';

export const SUPERSEDED_ERROR = 'Superseded after restart';

/**
 * Service for managing job operations
 */
export class JobService implements ReplyScheduler {
  constructor(
    private jobQueue: JobQueue,
    private jobRepository: IJobRepository,
    private logger: Logger = silentLogger
  ) {}

  enqueueReply(input: ReplyJobInput): string {
    return this.jobQueue.submitJob('generate-reply', input);
  }

  getJob(jobId: string): Job | null {
    return this.jobQueue.getJob(jobId);
  }

  cancelJob(jobId: string): boolean {
    return this.jobQueue.cancelJob(jobId);
  }

  listJobs(status?: JobStatus): Job[] {
    return status ? this.jobQueue.getJobsByStatus(status) : this.jobQueue.getAllJobs();
  }

  getStatistics(): QueueStatistics {
    return this.jobQueue.getStatistics();
  }

  completeJob(jobId: string, result: unknown): void {
    this.jobQueue.completeJob(jobId, result);
  }

  failJob(jobId: string, error: string): void {
    this.jobQueue.failJob(jobId, error);
  }

  updateProgress(jobId: string, progress: number, message: string): void {
    this.jobQueue.updateProgress(jobId, progress, message);
  }

  /**
   * Drop finished jobs older than `hoursOld`. Pending and running jobs are
   * never pruned.
   */
  clearOldJobs(hoursOld: number): number {
    const cleared = this.jobQueue.clearOldJobs(hoursOld);
    if (cleared > 0) {
      this.logger.info(`Pruned ${cleared} finished job(s) older than ${hoursOld}h`);
    }
    return cleared;
  }

  whenIdle(): Promise<void> {
    return this.jobQueue.whenIdle();
  }

  onJobStarted(handler: JobHandler): void {
    this.jobQueue.onJobStarted(handler);
  }

  /**
   * Resubmit jobs a previous process left pending or running. Each old record
   * is marked failed so it is not picked up again. Returns the new job ids.
   */
  restoreIncompleteJobs(): string[] {
    const incomplete = this.jobRepository
      .getAllJobs()
      .filter((job) => job.status === 'pending' || job.status === 'running');

    if (incomplete.length === 0) {
      return [];
    }
    this.logger.warn(`Restoring ${incomplete.length} incomplete jobs from database`);

    const restored: string[] = [];
    for (const job of incomplete) {
      try {
        this.jobRepository.saveJob({
          ...job,
          status: 'failed',
          error: SUPERSEDED_ERROR,
          completedAt: new Date(),
        });
      } catch (error) {
        this.logger.error(`Could not retire job ${job.id}: ${errorMessage(error)}`);
        continue;
      }
      const newJobId = this.jobQueue.submitJob(job.type, job.input);
      this.logger.info(`Restored job ${job.id} as ${newJobId}`);
      restored.push(newJobId);
    }
    return restored;
  }
}
