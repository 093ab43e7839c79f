import { z } from 'zod';
import { Job, ReplyJobInput } from '../../core/entities/Job.js';
import { errorMessage } from '../../core/errors.js';
import { Logger, silentLogger } from '../../utils/logger.js';
import { MessagePipeline } from '../services/MessagePipeline.js';
import { JobService } from '../services/JobService.js';

const ReplyJobInputSchema = z.object({
  roomId: z.string().min(1),
  messageBody: z.string(),
  authorId: z.string().nullable(),
  userMessageId: z.string(),
});

export interface ReplyJobResult {
  aiMessageId: string;
  aiPersisted: boolean;
}

/**
 * Executes generate-reply jobs handed out by the queue
 */
export class ReplyWorker {
  constructor(
    private pipeline: MessagePipeline,
    private jobs: JobService,
    private logger: Logger = silentLogger
  ) {}

  /**
   * Start taking jobs from the queue
   */
  attach(): void {
    this.jobs.onJobStarted((job) => this.run(job));
  }

  async run(job: Job): Promise<void> {
    const parsed = ReplyJobInputSchema.safeParse(job.input);
    if (!parsed.success) {
      this.jobs.failJob(job.id, `Invalid job input: ${parsed.error.message}`);
      return;
    }
    const input: ReplyJobInput = parsed.data;

    try {
      this.jobs.updateProgress(job.id, 10, 'Generating reply');
      const outcome = await this.pipeline.runReplyJob(input);
      const result: ReplyJobResult = {
        aiMessageId: outcome.aiMessage.id,
        aiPersisted: outcome.aiPersisted,
      };
      this.jobs.completeJob(job.id, result);
      this.logger.debug(`Job ${job.id} replied in room ${input.roomId}`);
    } catch (error) {
      this.logger.error(`Job ${job.id} failed: ${errorMessage(error)}`);
      this.jobs.failJob(job.id, errorMessage(error));
    }
  }
}
