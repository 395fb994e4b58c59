import {
  ID_PREFIXES,
  generateId,
  now,
  type ListQuery,
  type ListResponse,
  type Workflow,
} from '@threadline/sdk';
import type { AppContext } from '../../context.js';
import type { CreateWorkflowInput, ModifyWorkflowInput } from './workflows.schema.js';

export async function createWorkflow(
  ctx: AppContext,
  workspaceId: string,
  input: CreateWorkflowInput
): Promise<Workflow> {
  const assistant = await ctx.repos.assistants.findOne(input.assistant_id, { workspaceId });
  return ctx.repos.workflows.create({
    id: generateId(ID_PREFIXES.workflow),
    workspaceId,
    createdAt: now(),
    name: input.name,
    description: input.description,
    tags: input.tags,
    assistantId: assistant.id,
  });
}

export function getWorkflow(ctx: AppContext, workspaceId: string, workflowId: string): Promise<Workflow> {
  return ctx.repos.workflows.findOne(workflowId, { workspaceId });
}

/** With `tags`, only workflows carrying at least one of them. */
export function listWorkflows(
  ctx: AppContext,
  workspaceId: string,
  query: ListQuery,
  tags?: string[]
): Promise<ListResponse<Workflow>> {
  return ctx.repos.workflows.find(query, { workspaceId, tags });
}

export async function modifyWorkflow(
  ctx: AppContext,
  workspaceId: string,
  workflowId: string,
  input: ModifyWorkflowInput
): Promise<Workflow> {
  const workflow = await getWorkflow(ctx, workspaceId, workflowId);
  const assistantId =
    input.assistant_id === undefined
      ? workflow.assistantId
      : (await ctx.repos.assistants.findOne(input.assistant_id, { workspaceId })).id;

  return ctx.repos.workflows.update({
    ...workflow,
    name: input.name ?? workflow.name,
    description: input.description ?? workflow.description,
    tags: input.tags ?? workflow.tags,
    assistantId,
  });
}

export function deleteWorkflow(ctx: AppContext, workspaceId: string, workflowId: string): Promise<void> {
  return ctx.repos.workflows.delete(workflowId, { workspaceId });
}
