import {
  ID_PREFIXES,
  InvalidStateError,
  MAX_LIST_LIMIT,
  ROOT_MESSAGE_PARENT_ID,
  generateId,
  now,
  parseListQuery,
  type ListQuery,
  type ListResponse,
  type Thread,
} from '@threadline/sdk';
import type { AppContext } from '../../context.js';
import type { CreateThreadInput } from './threads.schema.js';

export function requireThread(ctx: AppContext, workspaceId: string, threadId: string): Promise<Thread> {
  return ctx.repos.threads.findOne(threadId, { workspaceId });
}

/** Creates the thread and its initial messages as one chain. */
export async function createThread(
  ctx: AppContext,
  workspaceId: string,
  input: CreateThreadInput
): Promise<Thread> {
  const thread = await ctx.repos.threads.create({
    id: generateId(ID_PREFIXES.thread),
    workspaceId,
    createdAt: now(),
    name: input.name ?? null,
  });

  let parentId = ROOT_MESSAGE_PARENT_ID;
  for (const message of input.messages) {
    const created = await ctx.tree.createMessage(thread.id, {
      parentId,
      role: message.role,
      content: message.content,
    });
    parentId = created.id;
  }
  return thread;
}

export function listThreads(
  ctx: AppContext,
  workspaceId: string,
  query: ListQuery
): Promise<ListResponse<Thread>> {
  return ctx.repos.threads.find(query, { workspaceId });
}

export async function modifyThread(
  ctx: AppContext,
  workspaceId: string,
  threadId: string,
  name: string | null
): Promise<Thread> {
  const thread = await requireThread(ctx, workspaceId, threadId);
  return ctx.repos.threads.update({ ...thread, name });
}

async function threadRunIds(ctx: AppContext, threadId: string): Promise<string[]> {
  const ids: string[] = [];
  let after: string | undefined;
  for (;;) {
    const page = await ctx.repos.runs.find(
      parseListQuery({ limit: MAX_LIST_LIMIT, order: 'asc', after }),
      { threadId }
    );
    ids.push(...page.data.map((run) => run.id));
    if (!page.hasMore || page.lastId === null) return ids;
    after = page.lastId;
  }
}

/**
 * Removes the thread with its messages, runs, events and executions. Active
 * runs are cancelled first and their tasks awaited, so none writes into the
 * thread once it is gone.
 */
export async function deleteThread(ctx: AppContext, workspaceId: string, threadId: string): Promise<void> {
  await requireThread(ctx, workspaceId, threadId);
  const runIds = await threadRunIds(ctx, threadId);
  for (const runId of runIds) {
    ctx.scheduler.signalCancel(runId);
  }
  if (!(await ctx.scheduler.waitFor(runIds, ctx.config.runStopTimeoutMs))) {
    ctx.logger.warn({ threadId }, 'Runs did not stop before thread deletion');
    throw new InvalidStateError(`Thread ${threadId} still has active runs`);
  }

  await ctx.repos.threads.delete(threadId, { workspaceId });
  ctx.tree.forgetThread(threadId);
  for (const runId of runIds) {
    ctx.events.forget(runId);
  }
}
