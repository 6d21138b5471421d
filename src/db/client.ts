import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import { type BaseSQLiteDatabase } from 'drizzle-orm/sqlite-core';
import { type Logger } from '../logger.js';
import * as schema from './schema.js';

export type AppDatabase = BaseSQLiteDatabase<'sync', Database.RunResult, typeof schema>;

export interface DatabaseHandle {
  db: AppDatabase
  close: () => void
}

const BOOTSTRAP_SQL = `
CREATE TABLE IF NOT EXISTS users (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  username TEXT(150) NOT NULL UNIQUE,
  password_hash TEXT NOT NULL
);
CREATE TABLE IF NOT EXISTS expenses (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  description TEXT(200) NOT NULL,
  amount REAL NOT NULL,
  date TEXT NOT NULL,
  category TEXT(100) NOT NULL,
  user_id INTEGER NOT NULL REFERENCES users(id)
);
CREATE INDEX IF NOT EXISTS expenses_user_date_idx ON expenses (user_id, date);
`;

/**
 * Opens the SQLite file (or `:memory:`) and creates the tables on first use.
 */
export const openDatabase = (path: string, log?: Logger): DatabaseHandle => {
  const sqlite = new Database(path);
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');
  sqlite.exec(BOOTSTRAP_SQL);
  log?.info('Database ready', { path });

  let closed = false;
  return {
    db: drizzle({ client: sqlite, schema }),
    close: () => {
      if (closed) return;
      closed = true;
      sqlite.close();
      log?.info('Database closed', { path });
    }
  };
};
