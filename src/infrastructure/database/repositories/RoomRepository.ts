import Database from 'better-sqlite3';
import { randomUUID } from 'crypto';
import { IRoomRepository } from '../../../core/interfaces/IRoomRepository.js';
import { Room, RoomSummary } from '../../../core/entities/Room.js';

interface RoomRow {
  id: string;
  name: string;
  description: string;
  created_by: string;
  created_at: string;
}

interface RoomSummaryRow extends RoomRow {
  message_count: number;
}

function toRoom(row: RoomRow): Room {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    createdBy: row.created_by,
    createdAt: row.created_at,
  };
}

/**
 * SQLite implementation of room repository
 */
export class RoomRepository implements IRoomRepository {
  constructor(
    private db: Database.Database,
    private clock: () => Date = () => new Date()
  ) {}

  createRoom(name: string, description: string, createdBy: string): Room {
    const room: Room = {
      id: randomUUID(),
      name,
      description,
      createdBy,
      createdAt: this.clock().toISOString(),
    };

    this.db
      .prepare(
        `INSERT INTO rooms (id, name, description, created_by, created_at)
         VALUES (?, ?, ?, ?, ?)`
      )
      .run(room.id, room.name, room.description, room.createdBy, room.createdAt);

    return room;
  }

  getRoom(roomId: string): Room | null {
    const row = this.db
      .prepare<[string], RoomRow>('SELECT * FROM rooms WHERE id = ?')
      .get(roomId);
    return row ? toRoom(row) : null;
  }

  findRoomByName(name: string): Room | null {
    const row = this.db
      .prepare<[string], RoomRow>('SELECT * FROM rooms WHERE name = ? COLLATE NOCASE LIMIT 1')
      .get(name.trim());
    return row ? toRoom(row) : null;
  }

  listRoomsWithCounts(): RoomSummary[] {
    const rows = this.db
      .prepare<[], RoomSummaryRow>(`
        SELECT r.*, COUNT(m.id) as message_count
        FROM rooms r
        LEFT JOIN messages m ON m.room_id = r.id
        GROUP BY r.id
        ORDER BY r.created_at DESC, r.id DESC
      `)
      .all();

    return rows.map((row) => ({ ...toRoom(row), messageCount: row.message_count }));
  }

  deleteRoom(roomId: string): boolean {
    const result = this.db.prepare('DELETE FROM rooms WHERE id = ?').run(roomId);
    return result.changes > 0;
  }

  deleteAllRooms(): number {
    return this.db.prepare('DELETE FROM rooms').run().changes;
  }
}
