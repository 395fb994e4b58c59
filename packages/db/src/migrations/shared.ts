import type Database from 'better-sqlite3';
import { z } from 'zod';
import { ROOT_MESSAGE_PARENT_ID, stripPrefix } from '@threadline/sdk';

const columnInfoSchema = z.array(z.object({ name: z.string() }));
const tableNameSchema = z.object({ name: z.string() }).optional();

export function tableExists(sqlite: Database.Database, table: string): boolean {
  const row = tableNameSchema.parse(
    sqlite.prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?").get(table)
  );
  return row !== undefined;
}

export function columnExists(sqlite: Database.Database, table: string, column: string): boolean {
  const columns = columnInfoSchema.parse(sqlite.prepare(`PRAGMA table_info(${table})`).all());
  return columns.some((info) => info.name === column);
}

const parentlessRowSchema = z.array(
  z.object({ id: z.string(), thread_id: z.string(), parent_id: z.string().nullable() })
);

/**
 * Gives every message without a parent its predecessor by id within the
 * thread, or the root sentinel for the first one. Rows that already have a
 * parent are left alone. Returns the number of rows changed.
 */
export function backfillMessageParents(sqlite: Database.Database): number {
  const rows = parentlessRowSchema.parse(
    sqlite.prepare('SELECT id, thread_id, parent_id FROM messages ORDER BY thread_id, id').all()
  );
  if (!rows.some((row) => row.parent_id === null)) return 0;

  const update = sqlite.prepare('UPDATE messages SET parent_id = ? WHERE id = ?');
  const root = stripPrefix(ROOT_MESSAGE_PARENT_ID);
  const previousByThread = new Map<string, string>();
  let changed = 0;

  sqlite.transaction(() => {
    for (const row of rows) {
      if (row.parent_id === null) {
        update.run(previousByThread.get(row.thread_id) ?? root, row.id);
        changed++;
      }
      previousByThread.set(row.thread_id, row.id);
    }
  })();

  return changed;
}
