import type { ListQuery, ListResponse, Message } from '@threadline/sdk';
import type { CreateMessageInput } from '@threadline/core';
import type { AppContext } from '../../context.js';
import { requireThread } from '../threads/threads.service.js';

export async function createMessage(
  ctx: AppContext,
  workspaceId: string,
  threadId: string,
  input: CreateMessageInput
): Promise<Message> {
  await requireThread(ctx, workspaceId, threadId);
  return ctx.tree.createMessage(threadId, input);
}

export async function listMessages(
  ctx: AppContext,
  workspaceId: string,
  threadId: string,
  query: ListQuery
): Promise<ListResponse<Message>> {
  await requireThread(ctx, workspaceId, threadId);
  return ctx.tree.listMessages(threadId, query);
}

export async function getMessage(
  ctx: AppContext,
  workspaceId: string,
  threadId: string,
  messageId: string
): Promise<Message> {
  await requireThread(ctx, workspaceId, threadId);
  return ctx.tree.getMessage(threadId, messageId);
}

/** Deletes the message with its descendants; returns every removed id. */
export async function deleteMessage(
  ctx: AppContext,
  workspaceId: string,
  threadId: string,
  messageId: string
): Promise<string[]> {
  await requireThread(ctx, workspaceId, threadId);
  return ctx.tree.deleteMessage(threadId, messageId);
}
