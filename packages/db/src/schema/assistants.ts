import { integer, sqliteTable, text, index } from 'drizzle-orm/sqlite-core';

export const assistants = sqliteTable(
  'assistants',
  {
    id: text('id').primaryKey(),
    workspaceId: text('workspace_id'),
    createdAt: integer('created_at', { mode: 'timestamp' }).notNull(),
    name: text('name'),
    description: text('description'),
    avatar: text('avatar'),
    tools: text('tools', { mode: 'json' }).$type<string[]>().notNull(),
    system: text('system'),
  },
  (table) => [index('idx_assistants_workspace').on(table.workspaceId)]
);
