import fs from 'fs';
import path from 'path';
import type { SqliteDatabase } from './connection';
import { logger } from '../utils/logger';

export const DEFAULT_MIGRATIONS_DIR = path.resolve(__dirname, '../../migrations');

function ensureMigrationsTable(db: SqliteDatabase): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      version TEXT NOT NULL UNIQUE,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);
}

function appliedVersions(db: SqliteDatabase): Set<string> {
  const rows = db.prepare('SELECT version FROM schema_migrations').all();
  const versions = new Set<string>();
  for (const row of rows) {
    if (row && typeof row === 'object' && 'version' in row && typeof row.version === 'string') {
      versions.add(row.version);
    }
  }
  return versions;
}

/**
 * Applies every `*.sql` file in `migrationsDir` not yet recorded in
 * `schema_migrations`, in filename order, each in its own transaction.
 * Returns the filenames applied by this call.
 */
export function runMigrations(db: SqliteDatabase, migrationsDir = DEFAULT_MIGRATIONS_DIR): string[] {
  ensureMigrationsTable(db);
  const applied = appliedVersions(db);

  const pending = fs
    .readdirSync(migrationsDir)
    .filter((file) => file.endsWith('.sql') && !applied.has(file))
    .sort();

  for (const file of pending) {
    const sql = fs.readFileSync(path.join(migrationsDir, file), 'utf-8');
    db.transaction(() => {
      db.exec(sql);
      db.prepare('INSERT INTO schema_migrations (version) VALUES (?)').run(file);
    })();
    logger.info('Applied migration', { file });
  }

  return pending;
}
