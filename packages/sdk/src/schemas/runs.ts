import { z } from 'zod';
import { optionalTimestampSchema, timestampSchema } from './common.js';

export const RUN_STATUSES = [
  'queued',
  'in_progress',
  'cancelling',
  'cancelled',
  'completed',
  'failed',
  'expired',
] as const;

export const runStatusSchema = z.enum(RUN_STATUSES);
export type RunStatus = z.infer<typeof runStatusSchema>;

export const runErrorCodeSchema = z.enum(['server_error', 'upstream_error', 'rate_limit_exceeded']);
export type RunErrorCode = z.infer<typeof runErrorCodeSchema>;

export const runErrorSchema = z.object({
  code: runErrorCodeSchema,
  message: z.string(),
});

export type RunError = z.infer<typeof runErrorSchema>;

export const runSchema = z.object({
  id: z.string(),
  threadId: z.string(),
  assistantId: z.string(),
  model: z.string(),
  instructions: z.string().nullish().transform((value) => value ?? null),
  createdAt: timestampSchema,
  startedAt: optionalTimestampSchema,
  completedAt: optionalTimestampSchema,
  failedAt: optionalTimestampSchema,
  cancelledAt: optionalTimestampSchema,
  triedCancellingAt: optionalTimestampSchema,
  expiresAt: timestampSchema,
  lastError: runErrorSchema.nullish().transform((value) => value ?? null),
});

export type Run = z.infer<typeof runSchema>;

const toolCallDetailsSchema = z.object({
  id: z.string(),
  type: z.literal('function'),
  function: z.object({
    name: z.string(),
    arguments: z.string(),
    output: z.string().nullable(),
  }),
});

export type ToolCallDetails = z.infer<typeof toolCallDetailsSchema>;

export const runStepDetailsSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('message_creation'), message_creation: z.object({ message_id: z.string() }) }),
  z.object({ type: z.literal('tool_calls'), tool_calls: z.array(toolCallDetailsSchema) }),
]);

export type RunStepDetails = z.infer<typeof runStepDetailsSchema>;

export const RUN_STEP_STATUSES = ['in_progress', 'completed', 'failed', 'cancelled', 'expired'] as const;
export type RunStepStatus = (typeof RUN_STEP_STATUSES)[number];

/** Sub-step of a run. Like runs, its status is derived from the timestamps. */
export const runStepSchema = z.object({
  id: z.string(),
  runId: z.string(),
  threadId: z.string(),
  assistantId: z.string(),
  type: z.enum(['message_creation', 'tool_calls']),
  stepDetails: runStepDetailsSchema,
  createdAt: timestampSchema,
  completedAt: optionalTimestampSchema,
  failedAt: optionalTimestampSchema,
  cancelledAt: optionalTimestampSchema,
  expiredAt: optionalTimestampSchema,
  lastError: runErrorSchema.nullish().transform((value) => value ?? null),
});

export type RunStep = z.infer<typeof runStepSchema>;
