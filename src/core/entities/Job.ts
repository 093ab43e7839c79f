/**
 * Job domain entity
 */
export type JobType = 'generate-reply';

export type JobStatus = 'pending' | 'running' | 'completed' | 'failed' | 'cancelled';

export interface Job {
  id: string;
  type: JobType;
  status: JobStatus;
  progress: number; // 0-100
  createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;
  input: Record<string, unknown>;
  result?: unknown;
  error?: string;
  progressUpdates: ProgressUpdate[];
}

export interface ProgressUpdate {
  timestamp: Date;
  message: string;
  percentage: number;
}

/**
 * Payload of a generate-reply job. Plain JSON so it survives the jobs table.
 */
export interface ReplyJobInput extends Record<string, unknown> {
  roomId: string;
  messageBody: string;
  authorId: string | null;
  userMessageId: string;
}

export function isFinished(status: JobStatus): boolean {
  return status === 'completed' || status === 'failed' || status === 'cancelled';
}
