import { isTerminalEvent, type EventRecord } from '@threadline/sdk';
import type { EventListener } from './event-publisher.js';

export interface EventSource {
  subscribe(runId: string, listener: EventListener): () => void;
  replay(runId: string, fromSequence?: number): AsyncGenerator<EventRecord>;
}

/**
 * Replays a run's log from `fromSequence`, then tails live events until a
 * terminal one. The subscription is taken before the replay starts, so an
 * event appended in between is seen once, through whichever path reaches it
 * first.
 */
export async function* followEvents(
  source: EventSource,
  runId: string,
  fromSequence = 0,
  signal?: AbortSignal
): AsyncGenerator<EventRecord> {
  const live: EventRecord[] = [];
  let wake: (() => void) | undefined;
  const unsubscribe = source.subscribe(runId, (record) => {
    live.push(record);
    wake?.();
  });
  const onAbort = () => wake?.();
  signal?.addEventListener('abort', onAbort);

  let lastSequence = fromSequence;
  try {
    for await (const record of source.replay(runId, fromSequence)) {
      if (signal?.aborted) return;
      if (record.sequenceNum <= lastSequence) continue;
      lastSequence = record.sequenceNum;
      yield record;
      if (isTerminalEvent(record.eventType)) return;
    }

    while (!signal?.aborted) {
      const record = live.shift();
      if (!record) {
        await new Promise<void>((resolve) => {
          wake = resolve;
        });
        wake = undefined;
        continue;
      }
      if (record.sequenceNum <= lastSequence) continue;
      lastSequence = record.sequenceNum;
      yield record;
      if (isTerminalEvent(record.eventType)) return;
    }
  } finally {
    unsubscribe();
    signal?.removeEventListener('abort', onAbort);
  }
}
