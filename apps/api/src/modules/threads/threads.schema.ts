import { z } from 'zod';
import { messageContentSchema, messageRoleSchema } from '@threadline/sdk';

export const initialMessageSchema = z.object({
  role: messageRoleSchema,
  content: messageContentSchema,
});

export const createThreadSchema = z.object({
  name: z.string().max(128).nullish(),
  messages: z.array(initialMessageSchema).default([]),
});

export const modifyThreadSchema = z.object({
  name: z.string().max(128).nullable(),
});

export type CreateThreadInput = z.infer<typeof createThreadSchema>;
