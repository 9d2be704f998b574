/**
 * SQLite database setup (better-sqlite3 + drizzle). `:memory:` gives a throwaway store.
 */
import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import fs from 'fs';
import path from 'path';
import * as schema from './schema';

export type VectorDatabase = BetterSQLite3Database<typeof schema>;

export interface OpenedDatabase {
  db: VectorDatabase;
  close(): void;
}

const CREATE_TABLES = `
CREATE TABLE IF NOT EXISTS vector_records (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  text TEXT NOT NULL,
  embedding TEXT NOT NULL,
  metadata TEXT NOT NULL,
  createdAt TEXT NOT NULL
);
`;

export function openDatabase(dbPath: string): OpenedDatabase {
  if (dbPath !== ':memory:') {
    const dataDir = path.dirname(path.resolve(dbPath));
    if (!fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true });
    }
  }

  const sqlite = new Database(dbPath);
  sqlite.pragma('journal_mode = WAL');
  sqlite.exec(CREATE_TABLES);

  return {
    db: drizzle(sqlite, { schema }),
    close: () => sqlite.close(),
  };
}
