import type { FastifyInstance } from 'fastify';
import { parseListQuery, toListObject, toRunObject, toRunStepObject } from '@threadline/sdk';
import type { RouteOptions } from '../../context.js';
import { sendEventStream } from '../../ndjson.js';
import { workspaceIdOf } from '../../workspace.js';
import { createThread } from '../threads/threads.service.js';
import {
  createRunSchema,
  createThreadAndRunSchema,
  modifyRunSchema,
  runEventsQuerySchema,
} from './runs.schema.js';
import {
  applyRunPatch,
  cancelRun,
  createRun,
  followRunEvents,
  getRun,
  getRunStep,
  listRunSteps,
  listRuns,
} from './runs.service.js';

type RunParams = { threadId: string; id: string };
type RunStepParams = RunParams & { stepId: string };

export async function runRoutes(app: FastifyInstance, { ctx }: RouteOptions) {
  // Create a run on an existing thread
  app.post<{ Params: { threadId: string } }>('/threads/:threadId/runs', async (req, reply) => {
    const workspaceId = workspaceIdOf(req);
    const body = createRunSchema.parse(req.body);

    const run = await createRun(ctx, workspaceId, req.params.threadId, {
      assistantId: body.assistant_id,
      model: body.model,
      instructions: body.instructions,
    });

    if (body.stream) {
      return sendEventStream(reply, (signal) => ctx.events.follow(run.id, 0, signal));
    }
    return reply.status(201).send(toRunObject(run));
  });

  // Create a thread and run it in one call
  app.post('/threads/runs', async (req, reply) => {
    const workspaceId = workspaceIdOf(req);
    const body = createThreadAndRunSchema.parse(req.body);

    const thread = await createThread(ctx, workspaceId, body.thread ?? { messages: [] });
    const run = await createRun(ctx, workspaceId, thread.id, {
      assistantId: body.assistant_id,
      model: body.model,
      instructions: body.instructions,
    });

    if (body.stream) {
      return sendEventStream(reply, (signal) => ctx.events.follow(run.id, 0, signal));
    }
    return reply.status(201).send(toRunObject(run));
  });

  app.get<{ Params: { threadId: string } }>('/threads/:threadId/runs', async (req) => {
    const workspaceId = workspaceIdOf(req);
    const query = parseListQuery(req.query);
    return toListObject(await listRuns(ctx, workspaceId, req.params.threadId, query), toRunObject);
  });

  app.get<{ Params: RunParams }>('/threads/:threadId/runs/:id', async (req) => {
    const { threadId, id } = req.params;
    return toRunObject(await getRun(ctx, workspaceIdOf(req), threadId, id));
  });

  app.patch<{ Params: RunParams }>('/threads/:threadId/runs/:id', async (req) => {
    const { threadId, id } = req.params;
    const workspaceId = workspaceIdOf(req);
    const patch = modifyRunSchema.parse(req.body);

    const run = await getRun(ctx, workspaceId, threadId, id);
    return toRunObject(await applyRunPatch(ctx, run, patch));
  });

  app.post<{ Params: RunParams }>('/threads/:threadId/runs/:id/cancel', async (req) => {
    const { threadId, id } = req.params;
    const run = await cancelRun(ctx, workspaceIdOf(req), threadId, id);
    app.log.info({ runId: id, threadId }, 'Run cancellation requested');
    return toRunObject(run);
  });

  // NDJSON replay from `after_sequence`, then live events until the log closes
  app.get<{ Params: RunParams }>('/threads/:threadId/runs/:id/events', async (req, reply) => {
    const { threadId, id } = req.params;
    const query = runEventsQuerySchema.parse(req.query);
    const open = await followRunEvents(ctx, workspaceIdOf(req), threadId, id, query.after_sequence);
    return sendEventStream(reply, open);
  });

  app.get<{ Params: RunParams }>('/threads/:threadId/runs/:id/steps', async (req) => {
    const { threadId, id } = req.params;
    const query = parseListQuery(req.query);
    return toListObject(await listRunSteps(ctx, workspaceIdOf(req), threadId, id, query), toRunStepObject);
  });

  app.get<{ Params: RunStepParams }>('/threads/:threadId/runs/:id/steps/:stepId', async (req) => {
    const { threadId, id, stepId } = req.params;
    return toRunStepObject(await getRunStep(ctx, workspaceIdOf(req), threadId, id, stepId));
  });
}
