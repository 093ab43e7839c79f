import { Job } from '../entities/Job.js';

/**
 * Interface for job persistence
 */
export interface IJobRepository {
  saveJob(job: Job): void;

  loadJob(jobId: string): Job | null;

  getAllJobs(): Job[];

  saveJobProgress(jobId: string, timestamp: Date, message: string, percentage: number): void;

  deleteJobsByAge(hoursOld: number): number;
}
