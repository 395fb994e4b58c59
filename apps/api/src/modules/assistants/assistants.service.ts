import {
  ID_PREFIXES,
  generateId,
  now,
  type Assistant,
  type ListQuery,
  type ListResponse,
} from '@threadline/sdk';
import type { AppContext } from '../../context.js';
import type { CreateAssistantInput, ModifyAssistantInput } from './assistants.schema.js';

export function createAssistant(
  ctx: AppContext,
  workspaceId: string,
  input: CreateAssistantInput
): Promise<Assistant> {
  return ctx.repos.assistants.create({
    id: generateId(ID_PREFIXES.assistant),
    workspaceId,
    createdAt: now(),
    name: input.name ?? null,
    description: input.description ?? null,
    avatar: input.avatar ?? null,
    tools: input.tools,
    system: input.system ?? null,
  });
}

export function getAssistant(ctx: AppContext, workspaceId: string, assistantId: string): Promise<Assistant> {
  return ctx.repos.assistants.findOne(assistantId, { workspaceId });
}

export function listAssistants(
  ctx: AppContext,
  workspaceId: string,
  query: ListQuery
): Promise<ListResponse<Assistant>> {
  return ctx.repos.assistants.find(query, { workspaceId });
}

export async function modifyAssistant(
  ctx: AppContext,
  workspaceId: string,
  assistantId: string,
  input: ModifyAssistantInput
): Promise<Assistant> {
  const assistant = await getAssistant(ctx, workspaceId, assistantId);
  return ctx.repos.assistants.update({
    ...assistant,
    name: input.name === undefined ? assistant.name : input.name,
    description: input.description === undefined ? assistant.description : input.description,
    avatar: input.avatar === undefined ? assistant.avatar : input.avatar,
    tools: input.tools ?? assistant.tools,
    system: input.system === undefined ? assistant.system : input.system,
  });
}

export function deleteAssistant(ctx: AppContext, workspaceId: string, assistantId: string): Promise<void> {
  return ctx.repos.assistants.delete(assistantId, { workspaceId });
}
