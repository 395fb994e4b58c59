import { integer, sqliteTable, text, index } from 'drizzle-orm/sqlite-core';
import type { ContentBlock } from '@threadline/sdk';
import { threads } from './threads.js';

export const messages = sqliteTable(
  'messages',
  {
    id: text('id').primaryKey(),
    threadId: text('thread_id')
      .notNull()
      .references(() => threads.id, { onDelete: 'cascade' }),
    // Added by the add-message-parent-id revision; always written by the repository.
    parentId: text('parent_id').notNull(),
    createdAt: integer('created_at', { mode: 'timestamp' }).notNull(),
    role: text('role', { enum: ['user', 'assistant'] }).notNull(),
    content: text('content', { mode: 'json' }).$type<ContentBlock[]>().notNull(),
    assistantId: text('assistant_id'),
    runId: text('run_id'),
  },
  (table) => [index('idx_messages_thread').on(table.threadId, table.id)]
);
