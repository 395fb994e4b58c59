import {
  ID_PREFIXES,
  LimitReachedError,
  generateId,
  now,
  type ListQuery,
  type ListResponse,
  type McpConfig,
} from '@threadline/sdk';
import type { AppContext } from '../../context.js';
import type { CreateMcpConfigInput, ModifyMcpConfigInput } from './mcp-configs.schema.js';

/** Counted over every config visible to the workspace, global ones included. */
export const MAX_MCP_CONFIGS = 100;

export async function createMcpConfig(
  ctx: AppContext,
  workspaceId: string,
  input: CreateMcpConfigInput
): Promise<McpConfig> {
  const count = await ctx.repos.mcpConfigs.count({ workspaceId });
  if (count >= MAX_MCP_CONFIGS) {
    throw new LimitReachedError(`MCP configuration limit of ${MAX_MCP_CONFIGS} reached`);
  }
  return ctx.repos.mcpConfigs.create({
    id: generateId(ID_PREFIXES.mcpConfig),
    workspaceId,
    createdAt: now(),
    name: input.name,
    mcpServer: input.mcp_server,
  });
}

export function getMcpConfig(ctx: AppContext, workspaceId: string, configId: string): Promise<McpConfig> {
  return ctx.repos.mcpConfigs.findOne(configId, { workspaceId });
}

export function listMcpConfigs(
  ctx: AppContext,
  workspaceId: string,
  query: ListQuery
): Promise<ListResponse<McpConfig>> {
  return ctx.repos.mcpConfigs.find(query, { workspaceId });
}

export async function modifyMcpConfig(
  ctx: AppContext,
  workspaceId: string,
  configId: string,
  input: ModifyMcpConfigInput
): Promise<McpConfig> {
  const config = await getMcpConfig(ctx, workspaceId, configId);
  return ctx.repos.mcpConfigs.update({
    ...config,
    name: input.name ?? config.name,
    mcpServer: input.mcp_server ?? config.mcpServer,
  });
}

export function deleteMcpConfig(ctx: AppContext, workspaceId: string, configId: string): Promise<void> {
  return ctx.repos.mcpConfigs.delete(configId, { workspaceId });
}
