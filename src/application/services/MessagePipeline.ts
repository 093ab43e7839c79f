import { randomUUID } from 'crypto';
import { IRoomRepository } from '../../core/interfaces/IRoomRepository.js';
import { IMessageRepository } from '../../core/interfaces/IMessageRepository.js';
import { IUserRepository } from '../../core/interfaces/IUserRepository.js';
import { IGeneratorClient } from '../../core/interfaces/IGeneratorClient.js';
import {
  AI_DISPLAY_NAME,
  ConversationEntry,
  Message,
  MessageView,
} from '../../core/entities/Message.js';
import { ReplyJobInput } from '../../core/entities/Job.js';
import { NotFoundError, PersistenceError, errorMessage } from '../../core/errors.js';
import { UNAVAILABLE_FALLBACK } from '../../core/fallbacks.js';
import { Result, attempt } from '../../core/result.js';
import { Logger, silentLogger } from '../../utils/logger.js';
import { CacheService } from './CacheService.js';
import { ContextWindowBuilder } from './ContextWindowBuilder.js';
import { UNKNOWN_AUTHOR } from './messageViews.js';

export interface SendMessageResult {
  userMessage: MessageView;
  aiMessage: MessageView;
  aiPersisted: boolean; // false when the reply could not be stored
}

export interface DeferredSendResult {
  userMessage: MessageView;
  jobId: string;
}

export interface ReplyOutcome {
  aiMessage: MessageView;
  aiPersisted: boolean;
  invalidationFailures: number;
}

/**
 * Hands a reply continuation to the background workers
 */
export interface ReplyScheduler {
  enqueueReply(input: ReplyJobInput): string;
}

export interface MessagePipelineDeps {
  rooms: IRoomRepository;
  messages: IMessageRepository;
  users: IUserRepository;
  cache: CacheService;
  windowBuilder: ContextWindowBuilder;
  generator: IGeneratorClient;
  scheduler?: ReplyScheduler;
  logger?: Logger;
}

export interface MessagePipelineOptions {
  contextLimit: number;
  aiUserId: string | null; // author recorded on replies; null marks them machine-generated
}

/**
 * Send pipeline: store the user's message, generate a reply, store the reply,
 * invalidate the room's cache entries.
 *
 * Only a failure to store the user's own message aborts a send. Generation,
 * reply storage and invalidation degrade to fallback text, an unsaved reply
 * and log lines respectively.
 */
export class MessagePipeline {
  private readonly logger: Logger;

  constructor(
    private deps: MessagePipelineDeps,
    private options: MessagePipelineOptions = { contextLimit: 10, aiUserId: null }
  ) {
    this.logger = deps.logger ?? silentLogger;
  }

  /**
   * Inline variant: the caller waits for the reply
   */
  async sendMessage(roomId: string, authorId: string, body: string): Promise<SendMessageResult> {
    const userMessage = await this.acceptUserMessage(roomId, authorId, body);
    const { aiMessage, aiPersisted } = await this.completeReply(roomId, body);
    return { userMessage, aiMessage, aiPersisted };
  }

  /**
   * Deferred variant: returns once the user's message is stored; a reply job
   * runs `completeReply` later
   */
  async sendMessageDeferred(
    roomId: string,
    authorId: string,
    body: string
  ): Promise<DeferredSendResult> {
    const scheduler = this.deps.scheduler;
    if (!scheduler) {
      throw new Error('Deferred replies are not configured');
    }

    const userMessage = await this.acceptUserMessage(roomId, authorId, body);
    const jobId = scheduler.enqueueReply({
      roomId,
      messageBody: body,
      authorId,
      userMessageId: userMessage.id,
    });

    this.logger.debug(`reply for message ${userMessage.id} queued as job ${jobId}`);
    return { userMessage, jobId };
  }

  /**
   * Entry point for reply jobs. The room may have been deleted since the
   * message was accepted.
   */
  async runReplyJob(input: ReplyJobInput): Promise<ReplyOutcome> {
    if (!this.deps.rooms.getRoom(input.roomId)) {
      throw new NotFoundError('Room', input.roomId);
    }
    return this.completeReply(input.roomId, input.messageBody);
  }

  /**
   * Everything after the user's message is durable: window, generation,
   * reply storage, invalidation. Shared by both variants.
   */
  async completeReply(roomId: string, prompt: string): Promise<ReplyOutcome> {
    const window = await this.loadWindow(roomId);
    const replyText = await this.generateReply(prompt, window);

    const stored = await this.persistReply(roomId, replyText);
    let aiMessage: MessageView;
    if (stored.ok) {
      aiMessage = { ...stored.value, username: AI_DISPLAY_NAME };
    } else {
      this.logger.error(`failed to save reply in room ${roomId}: ${stored.error.message}`);
      aiMessage = this.unsavedReply(roomId, replyText);
    }

    const invalidationFailures = this.deps.cache.reportFailures(
      await this.deps.cache.invalidateRoom(roomId)
    );

    return { aiMessage, aiPersisted: stored.ok, invalidationFailures };
  }

  private async acceptUserMessage(
    roomId: string,
    authorId: string,
    body: string
  ): Promise<MessageView> {
    // Existence gates a write, so it is read from the store, never the cache
    if (!this.deps.rooms.getRoom(roomId)) {
      throw new NotFoundError('Room', roomId);
    }

    let message: Message;
    try {
      message = this.deps.messages.insertMessage({
        roomId,
        userId: authorId,
        content: body,
        messageType: 'user',
      });
    } catch (error) {
      this.logger.error(`failed to save message in room ${roomId}: ${errorMessage(error)}`);
      throw new PersistenceError('Could not save message', error);
    }

    // A cached message list now lacks this message; drop it before the
    // window is built from it
    this.deps.cache.reportFailures(await this.deps.cache.invalidateRoom(roomId));

    const author = this.deps.users.getUser(authorId);
    return { ...message, username: author?.username ?? UNKNOWN_AUTHOR };
  }

  private async loadWindow(roomId: string): Promise<ConversationEntry[]> {
    const window = await attempt(() =>
      this.deps.windowBuilder.buildWindow(roomId, this.options.contextLimit)
    );
    if (!window.ok) {
      this.logger.warn(
        `context unavailable for room ${roomId}, replying without history: ${window.error.message}`
      );
      return [];
    }
    return window.value;
  }

  private async generateReply(prompt: string, window: ConversationEntry[]): Promise<string> {
    const reply = await attempt(() => this.deps.generator.generate(prompt, window));
    if (!reply.ok) {
      this.logger.error(`generator raised past its fallback: ${reply.error.message}`);
      return UNAVAILABLE_FALLBACK;
    }
    return reply.value;
  }

  private persistReply(roomId: string, content: string): Promise<Result<Message>> {
    return attempt(() =>
      this.deps.messages.insertMessage({
        roomId,
        userId: this.options.aiUserId,
        content,
        messageType: 'ai',
      })
    );
  }

  private unsavedReply(roomId: string, content: string): MessageView {
    return {
      id: randomUUID(),
      roomId,
      userId: this.options.aiUserId,
      content,
      messageType: 'ai',
      createdAt: new Date().toISOString(),
      username: AI_DISPLAY_NAME,
    };
  }
}
