import { z } from 'zod';

export const createExecutionSchema = z.object({
  workflow_id: z.string().min(1),
  thread_id: z.string().min(1).optional(),
});

export const listExecutionsQuerySchema = z.object({
  workflow_id: z.string().min(1).optional(),
  thread_id: z.string().min(1).optional(),
});

/** Only `status` is accepted; the run state machine rejects other fields. */
export const modifyExecutionSchema = z.record(z.unknown());

export type CreateExecutionInput = z.infer<typeof createExecutionSchema>;
