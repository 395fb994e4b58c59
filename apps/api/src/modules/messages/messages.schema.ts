import { z } from 'zod';
import { messageContentSchema, messageRoleSchema } from '@threadline/sdk';

export const createMessageSchema = z.object({
  role: messageRoleSchema,
  content: messageContentSchema,
  parent_id: z.string().min(1).optional(),
});
