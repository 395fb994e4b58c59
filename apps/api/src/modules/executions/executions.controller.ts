import type { FastifyInstance } from 'fastify';
import { parseListQuery, toExecutionObject, toListObject } from '@threadline/sdk';
import type { RouteOptions } from '../../context.js';
import { workspaceIdOf } from '../../workspace.js';
import {
  createExecutionSchema,
  listExecutionsQuerySchema,
  modifyExecutionSchema,
} from './executions.schema.js';
import {
  createExecution,
  getExecution,
  listExecutions,
  modifyExecution,
  type ExecutionWithRun,
} from './executions.service.js';

function toResponse({ execution, run }: ExecutionWithRun) {
  return toExecutionObject(execution, run);
}

export async function executionRoutes(app: FastifyInstance, { ctx }: RouteOptions) {
  app.post('/executions', async (req, reply) => {
    const workspaceId = workspaceIdOf(req);
    const body = createExecutionSchema.parse(req.body);
    return reply.status(201).send(toResponse(await createExecution(ctx, workspaceId, body)));
  });

  app.get('/executions', async (req) => {
    const workspaceId = workspaceIdOf(req);
    const filters = listExecutionsQuerySchema.parse(req.query);
    const query = parseListQuery(req.query);
    const page = await listExecutions(ctx, workspaceId, query, {
      workflowId: filters.workflow_id,
      threadId: filters.thread_id,
    });
    return toListObject(page, toResponse);
  });

  app.get<{ Params: { id: string } }>('/executions/:id', async (req) => {
    return toResponse(await getExecution(ctx, workspaceIdOf(req), req.params.id));
  });

  app.patch<{ Params: { id: string } }>('/executions/:id', async (req) => {
    const workspaceId = workspaceIdOf(req);
    const patch = modifyExecutionSchema.parse(req.body);
    return toResponse(await modifyExecution(ctx, workspaceId, req.params.id, patch));
  });
}
