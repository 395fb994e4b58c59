import { integer, sqliteTable, text, index } from 'drizzle-orm/sqlite-core';
import type { McpServer } from '@threadline/sdk';

export const mcpConfigs = sqliteTable(
  'mcp_configs',
  {
    id: text('id').primaryKey(),
    workspaceId: text('workspace_id'),
    createdAt: integer('created_at', { mode: 'timestamp' }).notNull(),
    name: text('name').notNull(),
    mcpServer: text('mcp_server', { mode: 'json' }).$type<McpServer>().notNull(),
  },
  (table) => [index('idx_mcp_configs_workspace').on(table.workspaceId)]
);
