import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import path from 'node:path';
import { logger } from '@relaypost/shared';

const log = logger.child({ module: 'db' });

export type Db = Database.Database;

interface Migration {
  version: number;
  name: string;
  sql: string;
}

const MIGRATIONS: Migration[] = [
  {
    version: 1,
    name: 'jobs',
    sql: `
      CREATE TABLE jobs (
        id              INTEGER PRIMARY KEY AUTOINCREMENT,
        variant         TEXT NOT NULL,
        context         TEXT NOT NULL,
        run_once_only   INTEGER NOT NULL DEFAULT 0,
        run_on_launch   INTEGER NOT NULL DEFAULT 0,
        recurring       INTEGER NOT NULL DEFAULT 0,
        details         TEXT,
        unique_key      TEXT NOT NULL,
        thread_id       TEXT,
        interaction_id  INTEGER,
        next_run_at     INTEGER NOT NULL,
        failure_count   INTEGER NOT NULL DEFAULT 0,
        created_at      INTEGER NOT NULL
      );
      CREATE INDEX idx_jobs_due ON jobs (context, run_on_launch, next_run_at, id);
      CREATE INDEX idx_jobs_unique ON jobs (context, variant, unique_key);

      CREATE TABLE job_completions (
        variant       TEXT NOT NULL,
        unique_key    TEXT NOT NULL,
        completed_at  INTEGER NOT NULL,
        PRIMARY KEY (variant, unique_key)
      );
    `,
  },
  {
    version: 2,
    name: 'messages',
    sql: `
      CREATE TABLE messages (
        id                 INTEGER PRIMARY KEY AUTOINCREMENT,
        thread_id          TEXT NOT NULL,
        author             TEXT NOT NULL,
        body               TEXT,
        state              TEXT NOT NULL,
        server_hash        TEXT UNIQUE,
        sent_at            INTEGER NOT NULL,
        expires_at         INTEGER,
        read_by_recipient  INTEGER NOT NULL DEFAULT 0,
        failure_reason     TEXT
      );
      CREATE INDEX idx_messages_thread ON messages (thread_id, sent_at);
      CREATE INDEX idx_messages_expiry ON messages (expires_at) WHERE expires_at IS NOT NULL;

      CREATE TABLE attachments (
        id            TEXT PRIMARY KEY,
        message_id    INTEGER REFERENCES messages(id) ON DELETE SET NULL,
        state         TEXT NOT NULL,
        content_type  TEXT NOT NULL,
        byte_count    INTEGER NOT NULL,
        server_id     TEXT,
        url           TEXT,
        encryption_key TEXT,
        digest        TEXT,
        data          BLOB
      );
      CREATE INDEX idx_attachments_message ON attachments (message_id);
    `,
  },
  {
    version: 3,
    name: 'open_groups_and_identity',
    sql: `
      CREATE TABLE open_group_rooms (
        server        TEXT NOT NULL,
        token         TEXT NOT NULL,
        name          TEXT NOT NULL,
        active_users  INTEGER NOT NULL DEFAULT 0,
        updated_at    INTEGER NOT NULL,
        PRIMARY KEY (server, token)
      );

      CREATE TABLE identity (
        variant  TEXT PRIMARY KEY,
        data     TEXT NOT NULL
      );
    `,
  },
];

/** Apply every migration newer than the recorded schema version. Returns the number applied. */
export function migrate(db: Db): number {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version     INTEGER PRIMARY KEY,
      name        TEXT NOT NULL,
      applied_at  INTEGER NOT NULL
    )
  `);

  const current = db.prepare<[], { version: number | null }>('SELECT MAX(version) AS version FROM schema_migrations').get();
  const applied = current?.version ?? 0;
  const pending = MIGRATIONS.filter((m) => m.version > applied);

  const record = db.prepare<[number, string, number]>(
    'INSERT INTO schema_migrations (version, name, applied_at) VALUES (?, ?, ?)',
  );
  for (const migration of pending) {
    db.transaction(() => {
      db.exec(migration.sql);
      record.run(migration.version, migration.name, Date.now());
    })();
    log.info({ version: migration.version, name: migration.name }, 'applied migration');
  }
  return pending.length;
}

/** Open (or create) the database file and bring its schema up to date. Pass ':memory:' for a throwaway database. */
export function openDatabase(file: string): Db {
  if (file !== ':memory:') {
    mkdirSync(path.dirname(file), { recursive: true });
  }
  log.info({ path: file }, 'opening SQLite database');
  const db = new Database(file);

  db.pragma('journal_mode = WAL');
  db.pragma('busy_timeout = 5000');
  db.pragma('foreign_keys = ON');

  migrate(db);
  return db;
}
