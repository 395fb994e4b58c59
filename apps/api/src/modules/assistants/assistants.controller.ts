import type { FastifyInstance } from 'fastify';
import { parseListQuery, toAssistantObject, toListObject } from '@threadline/sdk';
import type { RouteOptions } from '../../context.js';
import { workspaceIdOf } from '../../workspace.js';
import { createAssistantSchema, modifyAssistantSchema } from './assistants.schema.js';
import {
  createAssistant,
  deleteAssistant,
  getAssistant,
  listAssistants,
  modifyAssistant,
} from './assistants.service.js';

export async function assistantRoutes(app: FastifyInstance, { ctx }: RouteOptions) {
  app.post('/assistants', async (req, reply) => {
    const workspaceId = workspaceIdOf(req);
    const body = createAssistantSchema.parse(req.body ?? {});
    const assistant = await createAssistant(ctx, workspaceId, body);
    return reply.status(201).send(toAssistantObject(assistant));
  });

  app.get('/assistants', async (req) => {
    const workspaceId = workspaceIdOf(req);
    const query = parseListQuery(req.query);
    return toListObject(await listAssistants(ctx, workspaceId, query), toAssistantObject);
  });

  app.get<{ Params: { id: string } }>('/assistants/:id', async (req) => {
    return toAssistantObject(await getAssistant(ctx, workspaceIdOf(req), req.params.id));
  });

  app.post<{ Params: { id: string } }>('/assistants/:id', async (req) => {
    const workspaceId = workspaceIdOf(req);
    const body = modifyAssistantSchema.parse(req.body ?? {});
    return toAssistantObject(await modifyAssistant(ctx, workspaceId, req.params.id, body));
  });

  app.delete<{ Params: { id: string } }>('/assistants/:id', async (req) => {
    const { id } = req.params;
    await deleteAssistant(ctx, workspaceIdOf(req), id);
    return { id, object: 'assistant.deleted', deleted: true };
  });
}
