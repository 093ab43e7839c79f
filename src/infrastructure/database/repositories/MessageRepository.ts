import Database from 'better-sqlite3';
import { randomUUID } from 'crypto';
import { IMessageRepository } from '../../../core/interfaces/IMessageRepository.js';
import { Message, MessageType, NewMessage, SortOrder } from '../../../core/entities/Message.js';

interface MessageRow {
  id: string;
  room_id: string;
  user_id: string | null;
  content: string;
  message_type: MessageType;
  created_at: string;
}

function toMessage(row: MessageRow): Message {
  return {
    id: row.id,
    roomId: row.room_id,
    userId: row.user_id,
    content: row.content,
    messageType: row.message_type,
    createdAt: row.created_at,
  };
}

/**
 * SQLite implementation of message repository.
 * Timestamps handed out by one instance are strictly increasing, so a reply
 * written in the same millisecond as its prompt still sorts after it.
 */
export class MessageRepository implements IMessageRepository {
  private lastStamp = 0;

  constructor(
    private db: Database.Database,
    private clock: () => Date = () => new Date()
  ) {}

  insertMessage(message: NewMessage): Message {
    const stored: Message = {
      id: randomUUID(),
      roomId: message.roomId,
      userId: message.userId,
      content: message.content,
      messageType: message.messageType,
      createdAt: this.nextTimestamp(),
    };

    this.db
      .prepare(
        `INSERT INTO messages (id, room_id, user_id, content, message_type, created_at)
         VALUES (?, ?, ?, ?, ?, ?)`
      )
      .run(
        stored.id,
        stored.roomId,
        stored.userId,
        stored.content,
        stored.messageType,
        stored.createdAt
      );

    return stored;
  }

  listMessages(roomId: string, limit: number, order: SortOrder): Message[] {
    const rows = this.db
      .prepare<[string, number], MessageRow>(`
        SELECT * FROM messages
        WHERE room_id = ?
        ORDER BY created_at DESC, id DESC
        LIMIT ?
      `)
      .all(roomId, Math.max(0, limit));

    const messages = rows.map(toMessage);
    return order === 'asc' ? messages.reverse() : messages;
  }

  countMessages(roomId: string): number {
    const row = this.db
      .prepare<[string], { count: number }>(
        'SELECT COUNT(*) as count FROM messages WHERE room_id = ?'
      )
      .get(roomId);
    return row?.count ?? 0;
  }

  private nextTimestamp(): string {
    const now = this.clock().getTime();
    this.lastStamp = now > this.lastStamp ? now : this.lastStamp + 1;
    return new Date(this.lastStamp).toISOString();
  }
}
