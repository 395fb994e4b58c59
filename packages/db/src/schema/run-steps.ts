import { index, integer, sqliteTable, text } from 'drizzle-orm/sqlite-core';
import type { RunError, RunStepDetails } from '@threadline/sdk';
import { runs } from './runs.js';

export const runSteps = sqliteTable(
  'run_steps',
  {
    id: text('id').primaryKey(),
    runId: text('run_id')
      .notNull()
      .references(() => runs.id, { onDelete: 'cascade' }),
    threadId: text('thread_id').notNull(),
    assistantId: text('assistant_id').notNull(),
    type: text('type').$type<RunStepDetails['type']>().notNull(),
    stepDetails: text('step_details', { mode: 'json' }).$type<RunStepDetails>().notNull(),
    createdAt: integer('created_at', { mode: 'timestamp' }).notNull(),
    completedAt: integer('completed_at', { mode: 'timestamp' }),
    failedAt: integer('failed_at', { mode: 'timestamp' }),
    cancelledAt: integer('cancelled_at', { mode: 'timestamp' }),
    expiredAt: integer('expired_at', { mode: 'timestamp' }),
    lastError: text('last_error', { mode: 'json' }).$type<RunError>(),
  },
  (table) => [index('idx_run_steps_run').on(table.runId, table.id)]
);
