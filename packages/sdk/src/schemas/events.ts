import { z } from 'zod';
import { timestampSchema } from './common.js';
import type { RunError } from './runs.js';
import type {
  MessageDeltaObject,
  MessageObject,
  RunObject,
  RunStepDeltaObject,
  RunStepObject,
} from '../serializers.js';

export const RUN_EVENT_TYPES = [
  'thread.run.created',
  'thread.run.queued',
  'thread.run.in_progress',
  'thread.run.cancelling',
  'thread.run.cancelled',
  'thread.run.completed',
  'thread.run.failed',
  'thread.run.expired',
] as const;

export const RUN_STEP_EVENT_TYPES = [
  'thread.run.step.created',
  'thread.run.step.in_progress',
  'thread.run.step.completed',
  'thread.run.step.failed',
  'thread.run.step.cancelled',
  'thread.run.step.expired',
] as const;

export const EVENT_TYPES = [
  ...RUN_EVENT_TYPES,
  ...RUN_STEP_EVENT_TYPES,
  'thread.run.step.delta',
  'thread.message.created',
  'thread.message.delta',
  'error',
  'done',
] as const;

export type RunEventType = (typeof RUN_EVENT_TYPES)[number];
export type RunStepEventType = (typeof RUN_STEP_EVENT_TYPES)[number];
export type EventType = (typeof EVENT_TYPES)[number];

export const DONE_DATA = '[DONE]';

export type ThreadEvent =
  | { event: RunEventType; data: RunObject }
  | { event: RunStepEventType; data: RunStepObject }
  | { event: 'thread.run.step.delta'; data: RunStepDeltaObject }
  | { event: 'thread.message.created'; data: MessageObject }
  | { event: 'thread.message.delta'; data: MessageDeltaObject }
  | { event: 'error'; data: RunError }
  | { event: 'done'; data: typeof DONE_DATA };

export const eventTypeSchema = z.enum(EVENT_TYPES);

export const eventRecordSchema = z.object({
  runId: z.string(),
  threadId: z.string(),
  sequenceNum: z.number().int().positive(),
  eventType: eventTypeSchema,
  eventData: z.unknown(),
  createdAt: timestampSchema,
});

export interface EventRecord {
  runId: string;
  threadId: string;
  sequenceNum: number;
  eventType: EventType;
  eventData: unknown;
  createdAt: Date;
}

export function parseEventRecord(input: unknown): EventRecord {
  const { eventData, ...rest } = eventRecordSchema.parse(input);
  return { ...rest, eventData };
}

/** `done` and `error` close a run's log. */
export function isTerminalEvent(eventType: EventType): boolean {
  return eventType === 'done' || eventType === 'error';
}

/** Wire line of the NDJSON event stream. */
export function toEventLine(record: EventRecord): string {
  return `${JSON.stringify({ event: record.eventType, data: record.eventData })}\n`;
}
