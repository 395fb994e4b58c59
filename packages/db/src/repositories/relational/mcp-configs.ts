import { and, count, eq } from 'drizzle-orm';
import {
  ID_PREFIXES,
  NotFoundError,
  addPrefix,
  stripPrefix,
  type McpConfig,
  type ListQuery,
  type ListResponse,
} from '@threadline/sdk';
import type { DbClient } from '../../client.js';
import { mcpConfigs } from '../../schema/index.js';
import type { McpConfigRepository, WorkspaceFilter } from '../types.js';
import { existsQuietly } from '../exists.js';
import { cursorOrder, cursorWhere, guard, toPage, workspaceVisible } from './shared.js';

function toMcpConfig(row: typeof mcpConfigs.$inferSelect): McpConfig {
  return { ...row, id: addPrefix(ID_PREFIXES.mcpConfig, row.id) };
}

export class RelationalMcpConfigRepository implements McpConfigRepository {
  constructor(private readonly db: DbClient) {}

  async create(config: McpConfig): Promise<McpConfig> {
    guard('create MCP config', () =>
      this.db
        .insert(mcpConfigs)
        .values({ ...config, id: stripPrefix(config.id) })
        .run()
    );
    return config;
  }

  async findOne(id: string, filters?: WorkspaceFilter): Promise<McpConfig> {
    const row = guard('read MCP config', () =>
      this.db
        .select()
        .from(mcpConfigs)
        .where(
          and(
            eq(mcpConfigs.id, stripPrefix(id)),
            workspaceVisible(mcpConfigs.workspaceId, filters?.workspaceId)
          )
        )
        .get()
    );
    if (!row) throw NotFoundError.forResource('MCP config', id);
    return toMcpConfig(row);
  }

  async update(config: McpConfig): Promise<McpConfig> {
    const { id, ...values } = config;
    const result = guard('update MCP config', () =>
      this.db.update(mcpConfigs).set(values).where(eq(mcpConfigs.id, stripPrefix(id))).run()
    );
    if (result.changes === 0) throw NotFoundError.forResource('MCP config', id);
    return config;
  }

  async delete(id: string, filters?: WorkspaceFilter): Promise<void> {
    await this.findOne(id, filters);
    guard('delete MCP config', () =>
      this.db.delete(mcpConfigs).where(eq(mcpConfigs.id, stripPrefix(id))).run()
    );
  }

  async find(query: ListQuery, filters?: WorkspaceFilter): Promise<ListResponse<McpConfig>> {
    const rows = guard('list MCP configs', () =>
      this.db
        .select()
        .from(mcpConfigs)
        .where(
          and(
            ...cursorWhere(mcpConfigs.id, query),
            workspaceVisible(mcpConfigs.workspaceId, filters?.workspaceId)
          )
        )
        .orderBy(cursorOrder(mcpConfigs.id, query))
        .limit(query.limit + 1)
        .all()
    );
    return toPage(rows.map(toMcpConfig), query, (config) => config.id);
  }

  async count(filters?: WorkspaceFilter): Promise<number> {
    const row = guard('count MCP configs', () =>
      this.db
        .select({ total: count() })
        .from(mcpConfigs)
        .where(workspaceVisible(mcpConfigs.workspaceId, filters?.workspaceId))
        .get()
    );
    return row?.total ?? 0;
  }

  async exists(id: string, filters?: WorkspaceFilter): Promise<boolean> {
    return existsQuietly(() => this.findOne(id, filters));
  }
}
