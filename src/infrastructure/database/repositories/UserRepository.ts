import Database from 'better-sqlite3';
import { randomUUID } from 'crypto';
import { IUserRepository } from '../../../core/interfaces/IUserRepository.js';
import { User } from '../../../core/entities/User.js';

interface UserRow {
  id: string;
  username: string;
  created_at: string;
}

function toUser(row: UserRow): User {
  return { id: row.id, username: row.username, createdAt: row.created_at };
}

/**
 * SQLite implementation of user repository
 */
export class UserRepository implements IUserRepository {
  constructor(private db: Database.Database) {}

  createUser(username: string): User {
    const user: User = {
      id: randomUUID(),
      username,
      createdAt: new Date().toISOString(),
    };
    this.db
      .prepare('INSERT INTO users (id, username, created_at) VALUES (?, ?, ?)')
      .run(user.id, user.username, user.createdAt);
    return user;
  }

  getUser(userId: string): User | null {
    const row = this.db.prepare<[string], UserRow>('SELECT * FROM users WHERE id = ?').get(userId);
    return row ? toUser(row) : null;
  }

  getUsers(userIds: string[]): Map<string, User> {
    const users = new Map<string, User>();
    const unique = [...new Set(userIds)];
    if (unique.length === 0) {
      return users;
    }

    const placeholders = unique.map(() => '?').join(', ');
    const rows = this.db
      .prepare<string[], UserRow>(`SELECT * FROM users WHERE id IN (${placeholders})`)
      .all(...unique);
    for (const row of rows) {
      users.set(row.id, toUser(row));
    }
    return users;
  }
}
