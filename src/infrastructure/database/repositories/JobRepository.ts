import Database from 'better-sqlite3';
import { z } from 'zod';
import { IJobRepository } from '../../../core/interfaces/IJobRepository.js';
import { Job, ProgressUpdate } from '../../../core/entities/Job.js';

const JobRowSchema = z.object({
  id: z.string(),
  type: z.literal('generate-reply'),
  status: z.enum(['pending', 'running', 'completed', 'failed', 'cancelled']),
  progress: z.number(),
  created_at: z.string(),
  started_at: z.string().nullable(),
  completed_at: z.string().nullable(),
  input: z.string(),
  result: z.string().nullable(),
  error: z.string().nullable(),
});

type JobRow = z.infer<typeof JobRowSchema>;

const JobInputSchema = z.record(z.unknown());

interface ProgressRow {
  timestamp: string;
  message: string;
  percentage: number;
}

/**
 * SQLite implementation of job repository
 */
export class JobRepository implements IJobRepository {
  constructor(private db: Database.Database) {}

  saveJob(job: Job): void {
    const stmt = this.db.prepare(`
      INSERT INTO jobs (id, type, status, progress, created_at, started_at, completed_at, input, result, error)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        status = excluded.status,
        progress = excluded.progress,
        started_at = excluded.started_at,
        completed_at = excluded.completed_at,
        result = excluded.result,
        error = excluded.error
    `);

    stmt.run(
      job.id,
      job.type,
      job.status,
      job.progress,
      job.createdAt.toISOString(),
      job.startedAt ? job.startedAt.toISOString() : null,
      job.completedAt ? job.completedAt.toISOString() : null,
      JSON.stringify(job.input),
      job.result === undefined ? null : JSON.stringify(job.result),
      job.error ?? null
    );
  }

  loadJob(jobId: string): Job | null {
    const row: unknown = this.db.prepare('SELECT * FROM jobs WHERE id = ?').get(jobId);
    return row === undefined ? null : this.toJob(JobRowSchema.parse(row));
  }

  getAllJobs(): Job[] {
    const rows: unknown[] = this.db.prepare('SELECT * FROM jobs ORDER BY created_at DESC').all();
    return rows.map((row) => this.toJob(JobRowSchema.parse(row)));
  }

  saveJobProgress(jobId: string, timestamp: Date, message: string, percentage: number): void {
    this.db
      .prepare(`
        INSERT INTO job_progress (job_id, timestamp, message, percentage)
        VALUES (?, ?, ?, ?)
      `)
      .run(jobId, timestamp.toISOString(), message, percentage);
  }

  loadJobProgress(jobId: string): ProgressUpdate[] {
    const rows = this.db
      .prepare<[string], ProgressRow>(
        'SELECT timestamp, message, percentage FROM job_progress WHERE job_id = ? ORDER BY id'
      )
      .all(jobId);

    return rows.map((row) => ({
      timestamp: new Date(row.timestamp),
      message: row.message,
      percentage: row.percentage,
    }));
  }

  deleteJobsByAge(hoursOld: number = 24): number {
    const cutoffTime = new Date(Date.now() - hoursOld * 60 * 60 * 1000).toISOString();

    // job_progress rows go with their job (ON DELETE CASCADE)
    const result = this.db
      .prepare(`DELETE FROM jobs WHERE completed_at < ? AND status NOT IN ('pending', 'running')`)
      .run(cutoffTime);

    return result.changes;
  }

  private toJob(row: JobRow): Job {
    return {
      id: row.id,
      type: row.type,
      status: row.status,
      progress: row.progress,
      createdAt: new Date(row.created_at),
      startedAt: row.started_at ? new Date(row.started_at) : undefined,
      completedAt: row.completed_at ? new Date(row.completed_at) : undefined,
      input: JobInputSchema.parse(JSON.parse(row.input)),
      result: row.result === null ? undefined : JSON.parse(row.result),
      error: row.error ?? undefined,
      progressUpdates: this.loadJobProgress(row.id),
    };
  }
}
