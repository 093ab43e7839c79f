import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

export const IN_MEMORY = ':memory:';

const JOB_STATUSES = ['pending', 'running', 'completed', 'failed', 'cancelled'] as const;

/**
 * Database connection manager
 */
export class DatabaseConnection {
  private db: Database.Database;
  private dbPath: string;

  /**
   * @param dbPath - File name under `dataDir`, an absolute path, or `:memory:`
   */
  constructor(dbPath: string = 'chat.db', dataDir: string = path.resolve(process.cwd(), 'data')) {
    this.dbPath = dbPath === IN_MEMORY ? IN_MEMORY : path.resolve(dataDir, dbPath);

    if (this.dbPath !== IN_MEMORY) {
      const dir = path.dirname(this.dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(this.dbPath);
    if (this.dbPath !== IN_MEMORY) {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('foreign_keys = ON');

    this.initializeTables();
  }

  private initializeTables() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS users (
        id TEXT PRIMARY KEY,
        username TEXT NOT NULL UNIQUE,
        created_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS rooms (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        description TEXT NOT NULL DEFAULT '',
        created_by TEXT NOT NULL,
        created_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_rooms_created_at ON rooms(created_at);
      CREATE INDEX IF NOT EXISTS idx_rooms_name ON rooms(name COLLATE NOCASE);

      CREATE TABLE IF NOT EXISTS messages (
        id TEXT PRIMARY KEY,
        room_id TEXT NOT NULL,
        user_id TEXT,
        content TEXT NOT NULL,
        message_type TEXT NOT NULL CHECK (message_type IN ('user', 'ai')),
        created_at TEXT NOT NULL,
        FOREIGN KEY (room_id) REFERENCES rooms(id) ON DELETE CASCADE
      );

      CREATE INDEX IF NOT EXISTS idx_messages_room_created ON messages(room_id, created_at, id);

      CREATE TABLE IF NOT EXISTS jobs (
        id TEXT PRIMARY KEY,
        type TEXT NOT NULL,
        status TEXT NOT NULL,
        progress INTEGER DEFAULT 0,
        created_at TEXT NOT NULL,
        started_at TEXT,
        completed_at TEXT,
        input TEXT NOT NULL,
        result TEXT,
        error TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_job_status ON jobs(status);
      CREATE INDEX IF NOT EXISTS idx_job_created ON jobs(created_at);

      CREATE TABLE IF NOT EXISTS job_progress (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        job_id TEXT NOT NULL,
        timestamp TEXT NOT NULL,
        message TEXT NOT NULL,
        percentage INTEGER,
        FOREIGN KEY (job_id) REFERENCES jobs(id) ON DELETE CASCADE
      );

      CREATE INDEX IF NOT EXISTS idx_job_progress_id ON job_progress(job_id);
    `);
  }

  getDatabase(): Database.Database {
    return this.db;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  getStatistics(): {
    totalRooms: number;
    totalMessages: number;
    databaseSize: number;
    jobStats: Record<(typeof JOB_STATUSES)[number], number>;
  } {
    const count = (sql: string): number => {
      const row = this.db.prepare<[], { count: number }>(sql).get();
      return row?.count ?? 0;
    };

    let databaseSize = 0;
    if (this.dbPath !== IN_MEMORY && fs.existsSync(this.dbPath)) {
      databaseSize = fs.statSync(this.dbPath).size;
    }

    const rows = this.db
      .prepare<[], { status: string; count: number }>(
        'SELECT status, COUNT(*) as count FROM jobs GROUP BY status'
      )
      .all();
    const jobStats = { pending: 0, running: 0, completed: 0, failed: 0, cancelled: 0 };
    for (const status of JOB_STATUSES) {
      jobStats[status] = rows.find((row) => row.status === status)?.count ?? 0;
    }

    return {
      totalRooms: count('SELECT COUNT(*) as count FROM rooms'),
      totalMessages: count('SELECT COUNT(*) as count FROM messages'),
      databaseSize,
      jobStats,
    };
  }
}
