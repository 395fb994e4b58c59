import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema/index.js';

export type DbClient = BetterSQLite3Database<typeof schema>;

export interface DbHandle {
  db: DbClient;
  sqlite: Database.Database;
  close(): void;
}

const MEMORY_URLS = new Set([':memory:', 'sqlite::memory:', 'file::memory:']);

/** Accepts a plain path, `file:<path>`, `sqlite:<path>` or `:memory:`. */
export function resolveDatabasePath(url: string): string {
  if (MEMORY_URLS.has(url)) return ':memory:';
  return url.replace(/^(sqlite|file):(\/\/)?/, '');
}

export function openDb(url: string): DbHandle {
  const path = resolveDatabasePath(url);
  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true });
  }

  const sqlite = new Database(path);
  if (path !== ':memory:') {
    sqlite.pragma('journal_mode = WAL');
  }
  sqlite.pragma('foreign_keys = ON');

  const db = drizzle(sqlite, { schema });
  return {
    db,
    sqlite,
    close: () => {
      if (sqlite.open) sqlite.close();
    },
  };
}
