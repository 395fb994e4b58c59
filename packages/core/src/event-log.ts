import {
  ConflictError,
  isTerminalEvent,
  now,
  type EventRecord,
  type ThreadEvent,
} from '@threadline/sdk';
import type { EventRepository } from '@threadline/db';
import type { EventListener, EventPublisher } from './event-publisher.js';
import { followEvents, type EventSource } from './event-stream.js';

const REPLAY_PAGE_SIZE = 100;

interface RunLogState {
  nextSequence: number;
  closed: boolean;
}

/**
 * Append-only, per-run event log. Sequence numbers start at 1 and are
 * reserved synchronously once the run's state is loaded, so appends issued
 * from one task are numbered in call order. Only open logs stay cached: a
 * closed log is read back from the repository as closed.
 */
export class EventLog implements EventSource {
  private readonly states = new Map<string, Promise<RunLogState>>();

  constructor(
    private readonly events: EventRepository,
    private readonly publisher: EventPublisher
  ) {}

  private state(runId: string): Promise<RunLogState> {
    let state = this.states.get(runId);
    if (!state) {
      state = this.events.last(runId).then((last) => ({
        nextSequence: (last?.sequenceNum ?? 0) + 1,
        closed: last !== undefined && isTerminalEvent(last.eventType),
      }));
      this.states.set(runId, state);
      state.catch(() => this.states.delete(runId));
    }
    return state;
  }

  private release(runId: string, cached: Promise<RunLogState>): void {
    if (this.states.get(runId) === cached) this.states.delete(runId);
  }

  async append(runId: string, threadId: string, event: ThreadEvent): Promise<EventRecord> {
    const cached = this.state(runId);
    const state = await cached;
    if (state.closed) {
      this.release(runId, cached);
      throw new ConflictError(`Event log of run ${runId} is closed`);
    }
    const sequenceNum = state.nextSequence++;
    if (isTerminalEvent(event.event)) state.closed = true;

    const record: EventRecord = {
      runId,
      threadId,
      sequenceNum,
      eventType: event.event,
      eventData: event.data,
      createdAt: now(),
    };
    try {
      await this.events.append(record);
    } catch (error) {
      if (state.nextSequence === sequenceNum + 1) {
        state.nextSequence = sequenceNum;
        state.closed = false;
      }
      throw error;
    }
    if (state.closed) this.release(runId, cached);
    this.publisher.publish(record);
    return record;
  }

  async isClosed(runId: string): Promise<boolean> {
    const cached = this.state(runId);
    const { closed } = await cached;
    if (closed) this.release(runId, cached);
    return closed;
  }

  /** Runs whose open log state is held in memory. */
  get cachedRuns(): number {
    return this.states.size;
  }

  /** Lazily reads events with `sequenceNum > fromSequence`, a page at a time. */
  async *replay(runId: string, fromSequence = 0): AsyncGenerator<EventRecord> {
    let afterSequence = fromSequence;
    for (;;) {
      const page = await this.events.list(runId, { afterSequence, limit: REPLAY_PAGE_SIZE });
      yield* page;
      const last = page[page.length - 1];
      if (!last || page.length < REPLAY_PAGE_SIZE) return;
      afterSequence = last.sequenceNum;
    }
  }

  subscribe(runId: string, listener: EventListener): () => void {
    return this.publisher.subscribe(runId, listener);
  }

  follow(runId: string, fromSequence = 0, signal?: AbortSignal): AsyncGenerator<EventRecord> {
    return followEvents(this, runId, fromSequence, signal);
  }

  /** Drops cached state of runs that no longer exist. */
  forget(runId: string): void {
    this.states.delete(runId);
  }
}
