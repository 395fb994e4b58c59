import type { FastifyInstance } from 'fastify';
import { parseListQuery, toListObject, toMcpConfigObject } from '@threadline/sdk';
import type { RouteOptions } from '../../context.js';
import { workspaceIdOf } from '../../workspace.js';
import { createMcpConfigSchema, modifyMcpConfigSchema } from './mcp-configs.schema.js';
import {
  createMcpConfig,
  deleteMcpConfig,
  getMcpConfig,
  listMcpConfigs,
  modifyMcpConfig,
} from './mcp-configs.service.js';

export async function mcpConfigRoutes(app: FastifyInstance, { ctx }: RouteOptions) {
  app.post('/mcp-configs', async (req, reply) => {
    const workspaceId = workspaceIdOf(req);
    const body = createMcpConfigSchema.parse(req.body);
    const config = await createMcpConfig(ctx, workspaceId, body);
    return reply.status(201).send(toMcpConfigObject(config));
  });

  app.get('/mcp-configs', async (req) => {
    const workspaceId = workspaceIdOf(req);
    const query = parseListQuery(req.query);
    return toListObject(await listMcpConfigs(ctx, workspaceId, query), toMcpConfigObject);
  });

  app.get<{ Params: { id: string } }>('/mcp-configs/:id', async (req) => {
    return toMcpConfigObject(await getMcpConfig(ctx, workspaceIdOf(req), req.params.id));
  });

  app.post<{ Params: { id: string } }>('/mcp-configs/:id', async (req) => {
    const workspaceId = workspaceIdOf(req);
    const body = modifyMcpConfigSchema.parse(req.body ?? {});
    return toMcpConfigObject(await modifyMcpConfig(ctx, workspaceId, req.params.id, body));
  });

  app.delete<{ Params: { id: string } }>('/mcp-configs/:id', async (req) => {
    const { id } = req.params;
    await deleteMcpConfig(ctx, workspaceIdOf(req), id);
    return { id, object: 'mcp_config.deleted', deleted: true };
  });
}
