import {
  ID_PREFIXES,
  addSeconds,
  generateId,
  getRunStatus,
  modifyRun,
  now,
  requestCancel,
  toRunObject,
  type EventRecord,
  type ListQuery,
  type ListResponse,
  type Run,
  type RunStep,
} from '@threadline/sdk';
import type { AppContext } from '../../context.js';
import { requireThread } from '../threads/threads.service.js';

export const DEFAULT_RUN_MODEL = 'echo';

export interface CreateRunInput {
  assistantId: string;
  model?: string;
  instructions?: string;
}

/** Persists a queued run, records its first events and hands it to the scheduler. */
export async function createRun(
  ctx: AppContext,
  workspaceId: string,
  threadId: string,
  input: CreateRunInput
): Promise<Run> {
  await requireThread(ctx, workspaceId, threadId);
  const assistant = await ctx.repos.assistants.findOne(input.assistantId, { workspaceId });

  const createdAt = now();
  const run = await ctx.repos.runs.create({
    id: generateId(ID_PREFIXES.run),
    threadId,
    assistantId: assistant.id,
    model: input.model ?? DEFAULT_RUN_MODEL,
    instructions: input.instructions ?? assistant.system,
    createdAt,
    startedAt: null,
    completedAt: null,
    failedAt: null,
    cancelledAt: null,
    triedCancellingAt: null,
    expiresAt: addSeconds(createdAt, ctx.config.runExpiresAfterSeconds),
    lastError: null,
  });

  await ctx.events.append(run.id, threadId, { event: 'thread.run.created', data: toRunObject(run) });
  await ctx.events.append(run.id, threadId, { event: 'thread.run.queued', data: toRunObject(run) });
  ctx.scheduler.schedule(run);
  ctx.logger.info({ runId: run.id, threadId, assistantId: assistant.id }, 'Run created and scheduled');

  return run;
}

export async function getRun(
  ctx: AppContext,
  workspaceId: string,
  threadId: string,
  runId: string
): Promise<Run> {
  await requireThread(ctx, workspaceId, threadId);
  return ctx.repos.runs.findOne(runId, { threadId });
}

export async function listRuns(
  ctx: AppContext,
  workspaceId: string,
  threadId: string,
  query: ListQuery
): Promise<ListResponse<Run>> {
  await requireThread(ctx, workspaceId, threadId);
  return ctx.repos.runs.find(query, { threadId });
}

export async function listRunSteps(
  ctx: AppContext,
  workspaceId: string,
  threadId: string,
  runId: string,
  query: ListQuery
): Promise<ListResponse<RunStep>> {
  await getRun(ctx, workspaceId, threadId, runId);
  return ctx.repos.runSteps.find(query, { threadId, runId });
}

export async function getRunStep(
  ctx: AppContext,
  workspaceId: string,
  threadId: string,
  runId: string,
  stepId: string
): Promise<RunStep> {
  await getRun(ctx, workspaceId, threadId, runId);
  return ctx.repos.runSteps.findOne(stepId, { threadId, runId });
}

/**
 * A cancel request is confirmed by the task that owns the run. Without a task
 * in this process nobody would, so it is confirmed here.
 */
async function settleCancelRequest(ctx: AppContext, run: Run): Promise<Run> {
  if (getRunStatus(run) !== 'cancelling') return run;
  if (ctx.scheduler.signalCancel(run.id)) return run;
  if (await ctx.events.isClosed(run.id)) return run;
  return ctx.runner.confirmCancellation(run);
}

/**
 * Records the request against the stored row, which may have moved on since
 * `run` was read. A run that finished in between is returned as stored.
 */
async function recordCancelRequest(ctx: AppContext, run: Run, requested: Run, at: Date): Promise<Run> {
  if (requested === run) return settleCancelRequest(ctx, run);
  const current = await ctx.repos.runs.requestCancel(run.id, at);
  return settleCancelRequest(ctx, current);
}

/** Status-only modification; see `modifyRun`. */
export async function applyRunPatch(ctx: AppContext, run: Run, patch: Record<string, unknown>): Promise<Run> {
  const at = now();
  return recordCancelRequest(ctx, run, modifyRun(run, patch, at), at);
}

export async function cancelRun(
  ctx: AppContext,
  workspaceId: string,
  threadId: string,
  runId: string
): Promise<Run> {
  const run = await getRun(ctx, workspaceId, threadId, runId);
  const at = now();
  return recordCancelRequest(ctx, run, requestCancel(run, at), at);
}

export async function followRunEvents(
  ctx: AppContext,
  workspaceId: string,
  threadId: string,
  runId: string,
  afterSequence: number
): Promise<(signal: AbortSignal) => AsyncGenerator<EventRecord>> {
  await getRun(ctx, workspaceId, threadId, runId);
  return (signal) => ctx.events.follow(runId, afterSequence, signal);
}
