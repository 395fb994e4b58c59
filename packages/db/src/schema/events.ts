import { integer, sqliteTable, text, uniqueIndex } from 'drizzle-orm/sqlite-core';
import type { EventType } from '@threadline/sdk';
import { runs } from './runs.js';

export const events = sqliteTable(
  'events',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    runId: text('run_id')
      .notNull()
      .references(() => runs.id, { onDelete: 'cascade' }),
    threadId: text('thread_id').notNull(),
    sequenceNum: integer('sequence_num').notNull(),
    eventType: text('event_type').$type<EventType>().notNull(),
    eventData: text('event_data', { mode: 'json' }).$type<unknown>().notNull(),
    createdAt: integer('created_at', { mode: 'timestamp' }).notNull(),
  },
  (table) => [uniqueIndex('uidx_events_run_sequence').on(table.runId, table.sequenceNum)]
);
