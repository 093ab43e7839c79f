import { ConversationEntry } from '../../core/entities/Message.js';
import { MessageViewListSchema } from '../../core/entities/schemas.js';
import { IMessageRepository } from '../../core/interfaces/IMessageRepository.js';
import { IUserRepository } from '../../core/interfaces/IUserRepository.js';
import { roomMessagesKey } from '../../core/cacheKeys.js';
import { CacheService } from './CacheService.js';
import { toConversationEntry, toMessageViews } from './messageViews.js';

/**
 * Builds the bounded conversation window handed to the generator.
 * Reads through the room-messages cache entry when it covers the request,
 * otherwise reads the store. Never writes the cache.
 */
export class ContextWindowBuilder {
  constructor(
    private messageRepo: IMessageRepository,
    private userRepo: IUserRepository,
    private cache: CacheService,
    private displayLimit: number
  ) {}

  /**
   * The most recent `limit` messages of a room as (speaker, text), oldest first
   */
  async buildWindow(roomId: string, limit: number): Promise<ConversationEntry[]> {
    if (limit <= 0) {
      return [];
    }

    // Cached list is newest first and holds at most `displayLimit` messages;
    // a shorter list is the whole history.
    const cached = await this.cache.peek(roomMessagesKey(roomId), MessageViewListSchema);
    if (cached !== null && (cached.length >= limit || cached.length < this.displayLimit)) {
      return cached.slice(0, limit).reverse().map(toConversationEntry);
    }

    const messages = this.messageRepo.listMessages(roomId, limit, 'asc');
    return toMessageViews(messages, this.userRepo).map(toConversationEntry);
  }
}
