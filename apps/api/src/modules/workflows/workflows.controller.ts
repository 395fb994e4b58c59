import type { FastifyInstance } from 'fastify';
import { parseListQuery, toListObject, toWorkflowObject } from '@threadline/sdk';
import type { RouteOptions } from '../../context.js';
import { workspaceIdOf } from '../../workspace.js';
import { createWorkflowSchema, listWorkflowsQuerySchema, modifyWorkflowSchema } from './workflows.schema.js';
import {
  createWorkflow,
  deleteWorkflow,
  getWorkflow,
  listWorkflows,
  modifyWorkflow,
} from './workflows.service.js';

export async function workflowRoutes(app: FastifyInstance, { ctx }: RouteOptions) {
  app.post('/workflows', async (req, reply) => {
    const workspaceId = workspaceIdOf(req);
    const body = createWorkflowSchema.parse(req.body);
    const workflow = await createWorkflow(ctx, workspaceId, body);
    return reply.status(201).send(toWorkflowObject(workflow));
  });

  app.get('/workflows', async (req) => {
    const workspaceId = workspaceIdOf(req);
    const { tags } = listWorkflowsQuerySchema.parse(req.query);
    const query = parseListQuery(req.query);
    return toListObject(await listWorkflows(ctx, workspaceId, query, tags), toWorkflowObject);
  });

  app.get<{ Params: { id: string } }>('/workflows/:id', async (req) => {
    return toWorkflowObject(await getWorkflow(ctx, workspaceIdOf(req), req.params.id));
  });

  app.post<{ Params: { id: string } }>('/workflows/:id', async (req) => {
    const workspaceId = workspaceIdOf(req);
    const body = modifyWorkflowSchema.parse(req.body ?? {});
    return toWorkflowObject(await modifyWorkflow(ctx, workspaceId, req.params.id, body));
  });

  app.delete<{ Params: { id: string } }>('/workflows/:id', async (req) => {
    const { id } = req.params;
    await deleteWorkflow(ctx, workspaceIdOf(req), id);
    return { id, object: 'workflow.deleted', deleted: true };
  });
}
