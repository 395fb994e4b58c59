import {
  ID_PREFIXES,
  generateId,
  now,
  type Execution,
  type ListQuery,
  type ListResponse,
  type Run,
} from '@threadline/sdk';
import type { AppContext } from '../../context.js';
import { applyRunPatch, createRun } from '../runs/runs.service.js';
import { createThread, requireThread } from '../threads/threads.service.js';
import type { CreateExecutionInput } from './executions.schema.js';

const THREAD_NAME_MAX = 128;

export interface ExecutionWithRun {
  execution: Execution;
  run: Run;
}

/**
 * Starts a workflow: its description becomes a user message on the given
 * thread, or on a new one named after the workflow, and a run of the
 * workflow's assistant answers it.
 */
export async function createExecution(
  ctx: AppContext,
  workspaceId: string,
  input: CreateExecutionInput
): Promise<ExecutionWithRun> {
  const workflow = await ctx.repos.workflows.findOne(input.workflow_id, { workspaceId });
  const thread = input.thread_id
    ? await requireThread(ctx, workspaceId, input.thread_id)
    : await createThread(ctx, workspaceId, { name: workflow.name.slice(0, THREAD_NAME_MAX), messages: [] });

  await ctx.tree.createMessage(thread.id, {
    role: 'user',
    content: [{ type: 'text', text: workflow.description }],
  });
  const run = await createRun(ctx, workspaceId, thread.id, { assistantId: workflow.assistantId });

  const execution = await ctx.repos.executions.create({
    id: generateId(ID_PREFIXES.execution),
    workspaceId,
    createdAt: now(),
    workflowId: workflow.id,
    threadId: thread.id,
    runId: run.id,
  });
  ctx.logger.info({ executionId: execution.id, workflowId: workflow.id, runId: run.id }, 'Workflow execution started');

  return { execution, run };
}

async function withRun(ctx: AppContext, execution: Execution): Promise<ExecutionWithRun> {
  return { execution, run: await ctx.repos.runs.findOne(execution.runId) };
}

export async function getExecution(
  ctx: AppContext,
  workspaceId: string,
  executionId: string
): Promise<ExecutionWithRun> {
  return withRun(ctx, await ctx.repos.executions.findOne(executionId, { workspaceId }));
}

export async function listExecutions(
  ctx: AppContext,
  workspaceId: string,
  query: ListQuery,
  filters: { workflowId?: string; threadId?: string }
): Promise<ListResponse<ExecutionWithRun>> {
  const page = await ctx.repos.executions.find(query, { workspaceId, ...filters });
  return {
    ...page,
    data: await Promise.all(page.data.map((execution) => withRun(ctx, execution))),
  };
}

/** Changes the status of the execution's run. */
export async function modifyExecution(
  ctx: AppContext,
  workspaceId: string,
  executionId: string,
  patch: Record<string, unknown>
): Promise<ExecutionWithRun> {
  const { execution, run } = await getExecution(ctx, workspaceId, executionId);
  return { execution, run: await applyRunPatch(ctx, run, patch) };
}
