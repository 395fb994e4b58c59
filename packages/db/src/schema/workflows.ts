import { integer, sqliteTable, text, index } from 'drizzle-orm/sqlite-core';

export const workflows = sqliteTable(
  'workflows',
  {
    id: text('id').primaryKey(),
    workspaceId: text('workspace_id'),
    createdAt: integer('created_at', { mode: 'timestamp' }).notNull(),
    name: text('name').notNull(),
    description: text('description').notNull(),
    assistantId: text('assistant_id').notNull(),
  },
  (table) => [index('idx_workflows_workspace').on(table.workspaceId)]
);

export const workflowTags = sqliteTable(
  'workflow_tags',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    workflowId: text('workflow_id')
      .notNull()
      .references(() => workflows.id, { onDelete: 'cascade' }),
    tag: text('tag').notNull(),
  },
  (table) => [index('idx_workflow_tags_tag').on(table.tag, table.workflowId)]
);
