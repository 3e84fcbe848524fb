import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { getLogger } from '../../utils/logger.js';

let db: Database.Database | undefined;

const MIGRATIONS = [
  // Migration 000: Run history
  `
  CREATE TABLE IF NOT EXISTS runs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    source TEXT NOT NULL,
    started_at TEXT NOT NULL,
    finished_at TEXT NOT NULL,
    cancelled INTEGER NOT NULL DEFAULT 0,
    include_social INTEGER NOT NULL DEFAULT 0,
    topic_count INTEGER NOT NULL DEFAULT 0,
    top_topic TEXT,
    top_score REAL,
    snapshot_json TEXT NOT NULL,
    created_at TEXT NOT NULL DEFAULT (datetime('now'))
  );
  CREATE INDEX IF NOT EXISTS idx_runs_started ON runs(started_at);
  `,
  // Migration 001: LLM cost tracking
  `
  CREATE TABLE IF NOT EXISTS generations (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    run_id INTEGER REFERENCES runs(id),
    purpose TEXT NOT NULL,
    model TEXT NOT NULL,
    input_tokens INTEGER NOT NULL DEFAULT 0,
    output_tokens INTEGER NOT NULL DEFAULT 0,
    cost_cents REAL NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL DEFAULT (datetime('now'))
  );
  CREATE INDEX IF NOT EXISTS idx_gen_date ON generations(created_at);
  `,
];

function migrate(database: Database.Database): void {
  const log = getLogger();

  database.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);

  const applied = new Set(
    database.prepare<[], { id: number }>('SELECT id FROM _migrations').all().map(r => r.id),
  );

  MIGRATIONS.forEach((sql, i) => {
    if (applied.has(i)) return;
    log.debug(`Running migration ${i}`);
    database.exec(sql);
    database.prepare('INSERT INTO _migrations (id) VALUES (?)').run(i);
  });
}

/**
 * Open a database and bring it to the latest schema. Pass ':memory:' for a
 * throwaway store.
 */
export function openDb(dbPath: string): Database.Database {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const database = new Database(dbPath);
  if (dbPath !== ':memory:') database.pragma('journal_mode = WAL');
  database.pragma('foreign_keys = ON');
  migrate(database);
  return database;
}

/** Process-wide connection used by the CLI commands. */
export function getDb(dbPath: string): Database.Database {
  db ??= openDb(dbPath);
  return db;
}

export function closeDb(): void {
  db?.close();
  db = undefined;
}
