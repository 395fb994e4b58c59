import { integer, sqliteTable, text, index } from 'drizzle-orm/sqlite-core';

export const files = sqliteTable(
  'files',
  {
    id: text('id').primaryKey(),
    workspaceId: text('workspace_id'),
    createdAt: integer('created_at', { mode: 'timestamp' }).notNull(),
    filename: text('filename').notNull(),
    size: integer('size').notNull(),
    mediaType: text('media_type').notNull(),
  },
  (table) => [index('idx_files_workspace').on(table.workspaceId)]
);
