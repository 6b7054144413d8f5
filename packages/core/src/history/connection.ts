import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { runMigrations } from './migrations.js';

export type { Database } from 'better-sqlite3';

const connections = new Map<string, Database.Database>();

/**
 * Open or return a cached history database, migrated to the current schema.
 */
export function openHistoryDb(dbPath: string): Database.Database {
  const existing = connections.get(dbPath);
  if (existing) return existing;

  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  // Parallel matrix entries finish close together
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  runMigrations(db);

  connections.set(dbPath, db);
  return db;
}

/**
 * Close all cached database connections.
 */
export function closeAll(): void {
  for (const [path, db] of connections) {
    db.close();
    connections.delete(path);
  }
}
