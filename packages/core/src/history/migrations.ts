import type Database from 'better-sqlite3';

const CURRENT_SCHEMA_VERSION = 1;

const BASE_SCHEMA = `
  CREATE TABLE IF NOT EXISTS meta (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS runs (
    id TEXT PRIMARY KEY DEFAULT (lower(hex(randomblob(16)))),
    kind TEXT NOT NULL,
    label TEXT NOT NULL,
    platform TEXT NOT NULL,
    success INTEGER NOT NULL,
    exit_code INTEGER NOT NULL,
    started_at TEXT NOT NULL,
    finished_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_runs_started ON runs(started_at);

  CREATE TABLE IF NOT EXISTS run_steps (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    run_id TEXT NOT NULL REFERENCES runs(id) ON DELETE CASCADE,
    entry_id TEXT,
    task TEXT NOT NULL,
    status TEXT NOT NULL,
    exit_code INTEGER,
    duration_ms INTEGER,
    failed_step TEXT
  );

  CREATE INDEX IF NOT EXISTS idx_run_steps_run ON run_steps(run_id);
`;

function getSchemaVersion(db: Database.Database): number {
  const row = db
    .prepare<[], { value: string }>(`SELECT value FROM meta WHERE key = 'schema_version'`)
    .get();
  return row ? parseInt(row.value, 10) : 0;
}

/**
 * Create or upgrade the history schema.
 */
export function runMigrations(db: Database.Database): void {
  db.exec(BASE_SCHEMA);

  const version = getSchemaVersion(db);
  if (version < CURRENT_SCHEMA_VERSION) {
    db.prepare(
      `INSERT INTO meta (key, value) VALUES ('schema_version', ?)
       ON CONFLICT(key) DO UPDATE SET value = excluded.value`,
    ).run(String(CURRENT_SCHEMA_VERSION));
  }
}
