import type { FastifyInstance } from 'fastify';
import { parseListQuery, toListObject, toThreadObject } from '@threadline/sdk';
import type { RouteOptions } from '../../context.js';
import { workspaceIdOf } from '../../workspace.js';
import { createThreadSchema, modifyThreadSchema } from './threads.schema.js';
import { createThread, deleteThread, listThreads, modifyThread, requireThread } from './threads.service.js';

export async function threadRoutes(app: FastifyInstance, { ctx }: RouteOptions) {
  app.post('/threads', async (req, reply) => {
    const workspaceId = workspaceIdOf(req);
    const body = createThreadSchema.parse(req.body ?? {});

    const thread = await createThread(ctx, workspaceId, body);
    app.log.info({ threadId: thread.id, messages: body.messages.length }, 'Thread created');

    return reply.status(201).send(toThreadObject(thread));
  });

  app.get('/threads', async (req) => {
    const workspaceId = workspaceIdOf(req);
    const query = parseListQuery(req.query);
    return toListObject(await listThreads(ctx, workspaceId, query), toThreadObject);
  });

  app.get<{ Params: { id: string } }>('/threads/:id', async (req) => {
    const thread = await requireThread(ctx, workspaceIdOf(req), req.params.id);
    return toThreadObject(thread);
  });

  app.post<{ Params: { id: string } }>('/threads/:id', async (req) => {
    const workspaceId = workspaceIdOf(req);
    const body = modifyThreadSchema.parse(req.body);
    return toThreadObject(await modifyThread(ctx, workspaceId, req.params.id, body.name));
  });

  app.delete<{ Params: { id: string } }>('/threads/:id', async (req) => {
    const { id } = req.params;
    await deleteThread(ctx, workspaceIdOf(req), id);
    app.log.info({ threadId: id }, 'Thread deleted');
    return { id, object: 'thread.deleted', deleted: true };
  });
}
