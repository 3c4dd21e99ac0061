import Database from "better-sqlite3";
import path from "node:path";
import fs from "node:fs";

export type Db = Database.Database;

/** Open (or create) the chat database under the data directory */
export function initDb(dataDir: string): Db {
  fs.mkdirSync(dataDir, { recursive: true });
  return openDb(path.join(dataDir, "triad.sqlite"));
}

/** Open a database file, or ":memory:", with pragmas and schema applied */
export function openDb(filename: string): Db {
  const db = new Database(filename);
  if (filename !== ":memory:") {
    db.pragma("journal_mode = WAL");
  }
  db.pragma("foreign_keys = ON");
  db.pragma("busy_timeout = 5000");

  runMigrations(db);
  return db;
}

function runMigrations(db: Db): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS channels (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL UNIQUE,
      type TEXT NOT NULL CHECK(type IN ('group', 'dm')),
      participants TEXT NOT NULL,
      description TEXT,
      last_activity_at INTEGER,
      created_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_channels_activity
      ON channels(last_activity_at);

    CREATE TABLE IF NOT EXISTS messages (
      seq INTEGER PRIMARY KEY AUTOINCREMENT,
      id TEXT NOT NULL UNIQUE,
      channel_id TEXT NOT NULL REFERENCES channels(id) ON DELETE CASCADE,
      sender TEXT NOT NULL,
      content TEXT NOT NULL,
      type TEXT NOT NULL DEFAULT 'text' CHECK(type IN ('text', 'system', 'code')),
      metadata TEXT NOT NULL DEFAULT '{}',
      is_deleted INTEGER NOT NULL DEFAULT 0,
      edited_at INTEGER,
      created_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_messages_channel_time
      ON messages(channel_id, created_at, seq);

    CREATE INDEX IF NOT EXISTS idx_messages_channel_active
      ON messages(channel_id, created_at, seq) WHERE is_deleted = 0;

    CREATE INDEX IF NOT EXISTS idx_messages_sender
      ON messages(sender, created_at);

    CREATE TABLE IF NOT EXISTS read_positions (
      id TEXT PRIMARY KEY,
      channel_id TEXT NOT NULL REFERENCES channels(id) ON DELETE CASCADE,
      participant TEXT NOT NULL,
      last_read_at INTEGER,
      last_read_message_id TEXT,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL,
      UNIQUE(channel_id, participant)
    );

    CREATE INDEX IF NOT EXISTS idx_read_positions_participant
      ON read_positions(participant);
  `);
}

export function isUniqueViolation(err: unknown): boolean {
  return (
    err instanceof Error &&
    "code" in err &&
    (err.code === "SQLITE_CONSTRAINT_UNIQUE" || err.code === "SQLITE_CONSTRAINT_PRIMARYKEY")
  );
}

/** Parse a JSON column that holds a string array */
export function parseStringArray(raw: string): string[] {
  const value: unknown = JSON.parse(raw);
  if (!Array.isArray(value)) return [];
  return value.filter((v): v is string => typeof v === "string");
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Parse a JSON column that holds an object; anything else reads as {} */
export function parseRecord(raw: string): Record<string, unknown> {
  const value: unknown = JSON.parse(raw);
  return isRecord(value) ? value : {};
}
