import { Message, NewMessage, SortOrder } from '../entities/Message.js';

/**
 * Interface for message persistence. History is append-only per room.
 */
export interface IMessageRepository {
  insertMessage(message: NewMessage): Message;

  /**
   * Most recent `limit` messages of a room, returned in `order`
   */
  listMessages(roomId: string, limit: number, order: SortOrder): Message[];

  countMessages(roomId: string): number;
}
