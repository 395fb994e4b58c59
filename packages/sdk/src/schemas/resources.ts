import { z } from 'zod';
import { timestampSchema, workspaceIdSchema } from './common.js';

const nullableString = z.string().nullish().transform((value) => value ?? null);

export const assistantSchema = z.object({
  id: z.string(),
  workspaceId: workspaceIdSchema,
  createdAt: timestampSchema,
  name: nullableString,
  description: nullableString,
  avatar: nullableString,
  tools: z.array(z.string()).default([]),
  system: nullableString,
});

export type Assistant = z.infer<typeof assistantSchema>;

export const workflowSchema = z.object({
  id: z.string(),
  workspaceId: workspaceIdSchema,
  createdAt: timestampSchema,
  name: z.string().min(1),
  description: z.string(),
  tags: z.array(z.string()).default([]),
  assistantId: z.string(),
});

export type Workflow = z.infer<typeof workflowSchema>;

export const fileObjectSchema = z.object({
  id: z.string(),
  workspaceId: workspaceIdSchema,
  createdAt: timestampSchema,
  filename: z.string().min(1),
  size: z.number().int().nonnegative(),
  mediaType: z.string(),
});

export type FileObject = z.infer<typeof fileObjectSchema>;

export const mcpServerSchema = z.union([
  z.object({
    command: z.string().min(1),
    args: z.array(z.string()).default([]),
    env: z.record(z.string()).default({}),
  }),
  z.object({
    url: z.string().url(),
    headers: z.record(z.string()).default({}),
  }),
]);

export type McpServer = z.infer<typeof mcpServerSchema>;

export const mcpConfigSchema = z.object({
  id: z.string(),
  workspaceId: workspaceIdSchema,
  createdAt: timestampSchema,
  name: z.string().min(1),
  mcpServer: mcpServerSchema,
});

export type McpConfig = z.infer<typeof mcpConfigSchema>;

export const executionSchema = z.object({
  id: z.string(),
  workspaceId: workspaceIdSchema,
  createdAt: timestampSchema,
  workflowId: z.string(),
  threadId: z.string(),
  runId: z.string(),
});

export type Execution = z.infer<typeof executionSchema>;
