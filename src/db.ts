import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';

export type Db = Database.Database;

interface Migration {
  version: number;
  name: string;
  sql: string;
}

// The tasks table belongs to the task CRUD subsystem; it lives in the same
// database file and is only read here.
const MIGRATIONS: Migration[] = [
  {
    version: 1,
    name: 'tasks',
    sql: `
      CREATE TABLE IF NOT EXISTS tasks (
        id TEXT PRIMARY KEY,
        title TEXT NOT NULL,
        description TEXT NOT NULL DEFAULT '',
        status TEXT NOT NULL DEFAULT 'backlog'
          CHECK (status IN ('backlog', 'doing', 'waiting', 'done', 'canceled')),
        priority TEXT NOT NULL DEFAULT 'normal'
          CHECK (priority IN ('low', 'normal', 'high', 'urgent')),
        due_date TEXT,
        due_time TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS ix_tasks_due_date ON tasks (due_date);
    `,
  },
  {
    version: 2,
    name: 'notification-pipeline',
    sql: `
      CREATE TABLE IF NOT EXISTS notification_events (
        id TEXT PRIMARY KEY,
        kind TEXT NOT NULL,
        task_id TEXT,
        stage TEXT,
        slot TEXT,
        slot_date TEXT,
        payload TEXT NOT NULL DEFAULT '{}',
        rendered_text TEXT,
        status TEXT NOT NULL DEFAULT 'created'
          CHECK (status IN ('created', 'rendered', 'failed')),
        created_at TEXT NOT NULL,
        rendered_at TEXT
      );
      CREATE INDEX IF NOT EXISTS ix_notification_events_status
        ON notification_events (status, created_at);
      CREATE UNIQUE INDEX IF NOT EXISTS ix_notification_events_task_stage_unique
        ON notification_events (task_id, stage)
        WHERE kind = 'task_deadline_reminder';
      CREATE UNIQUE INDEX IF NOT EXISTS ix_notification_events_slot_unique
        ON notification_events (slot, slot_date)
        WHERE kind = 'followup_summary';

      CREATE TABLE IF NOT EXISTS notification_deliveries (
        id TEXT PRIMARY KEY,
        event_id TEXT NOT NULL REFERENCES notification_events (id) ON DELETE CASCADE,
        channel TEXT NOT NULL,
        status TEXT NOT NULL CHECK (status IN ('sent', 'failed')),
        destination TEXT,
        error TEXT,
        sent_at TEXT,
        created_at TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS ix_notification_deliveries_event
        ON notification_deliveries (event_id);

      CREATE TABLE IF NOT EXISTS messages (
        id TEXT PRIMARY KEY,
        role TEXT NOT NULL CHECK (role IN ('user', 'assistant', 'system')),
        content TEXT NOT NULL,
        event_id TEXT REFERENCES notification_events (id) ON DELETE SET NULL,
        created_at TEXT NOT NULL
      );
      CREATE UNIQUE INDEX IF NOT EXISTS ix_messages_event_unique
        ON messages (event_id)
        WHERE event_id IS NOT NULL;
      CREATE INDEX IF NOT EXISTS ix_messages_created_at ON messages (created_at);
    `,
  },
];

function readUserVersion(db: Db): number {
  const version = db.pragma('user_version', { simple: true });
  return typeof version === 'number' ? version : 0;
}

function applyMigrations(db: Db): void {
  const current = readUserVersion(db);
  for (const migration of MIGRATIONS) {
    if (migration.version <= current) continue;
    const apply = db.transaction(() => {
      db.exec(migration.sql);
      db.pragma(`user_version = ${migration.version}`);
    });
    apply();
    console.log(`[DB] Applied migration ${migration.version} (${migration.name})`);
  }
}

/**
 * Open (or create) the database and bring its schema up to date.
 * Pass `':memory:'` for a throwaway database.
 */
export function openDatabase(filePath: string): Db {
  if (filePath !== ':memory:') {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  }

  const db = new Database(filePath);
  db.pragma('foreign_keys = ON');
  if (filePath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('busy_timeout = 5000');
  applyMigrations(db);
  return db;
}

export function getSchemaVersion(db: Db): number {
  return readUserVersion(db);
}
