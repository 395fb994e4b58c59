import { integer, sqliteTable, text, index } from 'drizzle-orm/sqlite-core';
import type { RunError } from '@threadline/sdk';
import { threads } from './threads.js';

export const runs = sqliteTable(
  'runs',
  {
    id: text('id').primaryKey(),
    threadId: text('thread_id')
      .notNull()
      .references(() => threads.id, { onDelete: 'cascade' }),
    assistantId: text('assistant_id').notNull(),
    model: text('model').notNull(),
    instructions: text('instructions'),
    createdAt: integer('created_at', { mode: 'timestamp' }).notNull(),
    // Status is derived from these; there is no status column.
    startedAt: integer('started_at', { mode: 'timestamp' }),
    completedAt: integer('completed_at', { mode: 'timestamp' }),
    failedAt: integer('failed_at', { mode: 'timestamp' }),
    cancelledAt: integer('cancelled_at', { mode: 'timestamp' }),
    triedCancellingAt: integer('tried_cancelling_at', { mode: 'timestamp' }),
    expiresAt: integer('expires_at', { mode: 'timestamp' }).notNull(),
    lastError: text('last_error', { mode: 'json' }).$type<RunError>(),
  },
  (table) => [index('idx_runs_thread').on(table.threadId, table.id)]
);
