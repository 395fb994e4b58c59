import type { FastifyInstance } from 'fastify';
import { parseListQuery, toListObject, toMessageObject } from '@threadline/sdk';
import type { RouteOptions } from '../../context.js';
import { workspaceIdOf } from '../../workspace.js';
import { createMessageSchema } from './messages.schema.js';
import { createMessage, deleteMessage, getMessage, listMessages } from './messages.service.js';

type MessageParams = { threadId: string; id: string };

export async function messageRoutes(app: FastifyInstance, { ctx }: RouteOptions) {
  app.post<{ Params: { threadId: string } }>('/threads/:threadId/messages', async (req, reply) => {
    const workspaceId = workspaceIdOf(req);
    const body = createMessageSchema.parse(req.body);

    const message = await createMessage(ctx, workspaceId, req.params.threadId, {
      parentId: body.parent_id,
      role: body.role,
      content: body.content,
    });

    return reply.status(201).send(toMessageObject(message));
  });

  app.get<{ Params: { threadId: string } }>('/threads/:threadId/messages', async (req) => {
    const workspaceId = workspaceIdOf(req);
    const query = parseListQuery(req.query);
    const page = await listMessages(ctx, workspaceId, req.params.threadId, query);
    return toListObject(page, toMessageObject);
  });

  app.get<{ Params: MessageParams }>('/threads/:threadId/messages/:id', async (req) => {
    const { threadId, id } = req.params;
    return toMessageObject(await getMessage(ctx, workspaceIdOf(req), threadId, id));
  });

  app.delete<{ Params: MessageParams }>('/threads/:threadId/messages/:id', async (req) => {
    const { threadId, id } = req.params;
    const removed = await deleteMessage(ctx, workspaceIdOf(req), threadId, id);
    app.log.info({ threadId, messageId: id, removed: removed.length }, 'Message subtree deleted');
    return { id, object: 'thread.message.deleted', deleted: true };
  });
}
