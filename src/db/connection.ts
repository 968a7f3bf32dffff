import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';

export type SqliteDatabase = Database.Database;

/**
 * Opens (and creates, if needed) the SQLite file at `dbPath`. `:memory:`
 * gives a throwaway database.
 */
export function openDatabase(dbPath: string): SqliteDatabase {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
  }

  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('busy_timeout = 5000');
  return db;
}
