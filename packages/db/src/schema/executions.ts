import { integer, sqliteTable, text, index } from 'drizzle-orm/sqlite-core';

export const executions = sqliteTable(
  'executions',
  {
    id: text('id').primaryKey(),
    workspaceId: text('workspace_id'),
    createdAt: integer('created_at', { mode: 'timestamp' }).notNull(),
    workflowId: text('workflow_id').notNull(),
    threadId: text('thread_id').notNull(),
    runId: text('run_id').notNull(),
  },
  (table) => [
    index('idx_executions_workflow').on(table.workflowId),
    index('idx_executions_thread').on(table.threadId),
  ]
);
