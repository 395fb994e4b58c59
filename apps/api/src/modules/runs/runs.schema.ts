import { z } from 'zod';
import { createThreadSchema } from '../threads/threads.schema.js';

export const createRunSchema = z.object({
  assistant_id: z.string().min(1),
  model: z.string().min(1).optional(),
  instructions: z.string().optional(),
  stream: z.boolean().default(false),
});

export const createThreadAndRunSchema = createRunSchema.extend({
  thread: createThreadSchema.optional(),
});

/** Field checks happen in `modifyRun`, which only accepts `status`. */
export const modifyRunSchema = z.record(z.unknown());

export const runEventsQuerySchema = z.object({
  after_sequence: z.coerce.number().int().min(0).default(0),
});
