import { z } from 'zod';
import { timestampSchema, workspaceIdSchema } from './common.js';

export const imageDetailSchema = z.enum(['auto', 'low', 'high']);

export const textBlockSchema = z.object({
  type: z.literal('text'),
  text: z.string(),
});

export const imageUrlBlockSchema = z.object({
  type: z.literal('image_url'),
  image_url: z.object({
    url: z.string().min(1),
    detail: imageDetailSchema.optional(),
  }),
});

export const imageFileBlockSchema = z.object({
  type: z.literal('image_file'),
  image_file: z.object({
    file_id: z.string().min(1),
    detail: imageDetailSchema.optional(),
  }),
});

export const contentBlockSchema = z.discriminatedUnion('type', [
  textBlockSchema,
  imageUrlBlockSchema,
  imageFileBlockSchema,
]);

export type TextBlock = z.infer<typeof textBlockSchema>;
export type ContentBlock = z.infer<typeof contentBlockSchema>;

export const messageRoleSchema = z.enum(['user', 'assistant']);
export type MessageRole = z.infer<typeof messageRoleSchema>;

/** Plain strings are shorthand for a single text block. */
export const messageContentSchema = z.union([
  z.string().transform((text): ContentBlock[] => [{ type: 'text', text }]),
  z.array(contentBlockSchema),
]);

export const threadSchema = z.object({
  id: z.string(),
  workspaceId: workspaceIdSchema,
  createdAt: timestampSchema,
  name: z.string().max(128).nullish().transform((value) => value ?? null),
});

export type Thread = z.infer<typeof threadSchema>;

export const messageSchema = z.object({
  id: z.string(),
  threadId: z.string(),
  parentId: z.string(),
  createdAt: timestampSchema,
  role: messageRoleSchema,
  content: z.array(contentBlockSchema),
  assistantId: z.string().nullish().transform((value) => value ?? null),
  runId: z.string().nullish().transform((value) => value ?? null),
});

export type Message = z.infer<typeof messageSchema>;

