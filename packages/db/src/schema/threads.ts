import { integer, sqliteTable, text, index } from 'drizzle-orm/sqlite-core';

export const threads = sqliteTable(
  'threads',
  {
    id: text('id').primaryKey(),
    workspaceId: text('workspace_id'),
    createdAt: integer('created_at', { mode: 'timestamp' }).notNull(),
    name: text('name'),
  },
  (table) => [index('idx_threads_workspace').on(table.workspaceId)]
);
