/**
 * Unit tests for the event log, publisher and follow stream
 */

import { Writable } from 'node:stream';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ConflictError, now, type EventRecord, type Run, type ThreadEvent } from '@threadline/sdk';
import { EventLog } from '../../src/event-log.js';
import { EventPublisher, NdjsonSink } from '../../src/event-publisher.js';
import { followEvents, type EventSource } from '../../src/event-stream.js';
import { collect, createMockLogger, createRun, createTestEngine, type TestEngine } from '../test-utils.js';

const stepDelta = (chunk: string): ThreadEvent => ({
  event: 'thread.run.step.delta',
  data: {
    id: 'step_1',
    object: 'thread.run.step.delta',
    delta: { step_details: { type: 'tool_calls', tool_calls: [{ index: 0, type: 'function', function: { arguments: chunk } }] } },
  },
});
const DONE: ThreadEvent = { event: 'done', data: '[DONE]' };
const sequences = (records: EventRecord[]) => records.map((record) => record.sequenceNum);

function record(runId: string, sequenceNum: number, eventType: EventRecord['eventType'] = 'thread.run.step.delta'): EventRecord {
  return { runId, threadId: 'thread_1', sequenceNum, eventType, eventData: {}, createdAt: now() };
}

describe('EventLog [unit]', () => {
  let engine: TestEngine;
  let run: Run;

  beforeEach(async () => {
    engine = await createTestEngine();
    run = await createRun(engine.repos);
  });

  afterEach(async () => {
    await engine.cleanup();
  });

  const append = (event: ThreadEvent) => engine.events.append(run.id, run.threadId, event);

  describe('append', () => {
    it('should number events from 1 without gaps', async () => {
      await append(stepDelta('a'));
      await append(stepDelta('b'));
      await append(DONE);

      const stored = await engine.repos.events.list(run.id, { afterSequence: 0, limit: 10 });
      expect(sequences(stored)).toEqual([1, 2, 3]);
      expect(stored.map((item) => item.eventType)).toEqual(['thread.run.step.delta', 'thread.run.step.delta', 'done']);
    });

    it('should number concurrent appends in call order', async () => {
      const records = await Promise.all(['a', 'b', 'c', 'd', 'e'].map((chunk) => append(stepDelta(chunk))));

      expect(sequences(records)).toEqual([1, 2, 3, 4, 5]);
    });

    it('should close the log after done', async () => {
      await append(DONE);

      await expect(append(stepDelta('late'))).rejects.toThrow(ConflictError);
    });

    it('should close the log after an error event', async () => {
      await append({ event: 'error', data: { code: 'server_error', message: 'boom' } });

      await expect(append(DONE)).rejects.toThrow(ConflictError);
    });

    it('should continue numbering from storage', async () => {
      await append(stepDelta('a'));
      await append(stepDelta('b'));

      const reopened = new EventLog(engine.repos.events, new EventPublisher(createMockLogger()));
      const next = await reopened.append(run.id, run.threadId, DONE);

      expect(next.sequenceNum).toBe(3);
      await expect(reopened.append(run.id, run.threadId, stepDelta('c'))).rejects.toThrow(ConflictError);
    });

    it('should store the wire data of the event', async () => {
      const appended = await append(DONE);

      expect(appended.eventData).toBe('[DONE]');
      expect((await engine.repos.events.last(run.id))?.eventData).toBe('[DONE]');
    });

    it('should hold the state of an open log only', async () => {
      await append(stepDelta('a'));
      expect(engine.events.cachedRuns).toBe(1);

      await append(DONE);
      expect(engine.events.cachedRuns).toBe(0);

      await expect(append(stepDelta('late'))).rejects.toThrow(ConflictError);
      expect(await engine.events.isClosed(run.id)).toBe(true);
      expect(engine.events.cachedRuns).toBe(0);
    });
  });

  describe('replay', () => {
    it('should resume after any sequence number', async () => {
      for (const chunk of ['a', 'b', 'c']) await append(stepDelta(chunk));

      expect(sequences(await collect(engine.events.replay(run.id)))).toEqual([1, 2, 3]);
      expect(sequences(await collect(engine.events.replay(run.id, 2)))).toEqual([3]);
      expect(sequences(await collect(engine.events.replay(run.id, 3)))).toEqual([]);
    });

    it('should read across pages', async () => {
      for (let i = 0; i < 230; i++) await append(stepDelta(String(i)));

      const replayed = await collect(engine.events.replay(run.id));

      expect(replayed).toHaveLength(230);
      expect(replayed[229]?.sequenceNum).toBe(230);
    });
  });

  describe('publishing', () => {
    it('should deliver appended events to subscribers until they unsubscribe', async () => {
      const received: number[] = [];
      const unsubscribe = engine.events.subscribe(run.id, (item) => received.push(item.sequenceNum));

      await append(stepDelta('a'));
      unsubscribe();
      await append(stepDelta('b'));

      expect(received).toEqual([1]);
    });

    it('should not fail the append when a listener throws', async () => {
      engine.events.subscribe(run.id, () => {
        throw new Error('listener broke');
      });

      await expect(append(stepDelta('a'))).resolves.toMatchObject({ sequenceNum: 1 });
      expect(engine.logger.warn).toHaveBeenCalledWith(
        { runId: run.id, error: 'listener broke' },
        'Event listener failed'
      );
    });

    it('should write NDJSON lines to a sink', async () => {
      const lines: string[] = [];
      const stream = new Writable({
        write(chunk: Buffer, _encoding, callback) {
          lines.push(chunk.toString());
          callback();
        },
      });
      const publisher = new EventPublisher(createMockLogger(), [new NdjsonSink(stream)]);

      publisher.publish({ ...record(run.id, 1, 'done'), eventData: '[DONE]' });

      expect(lines).toEqual(['{"event":"done","data":"[DONE]"}\n']);
    });

    it('should log a failing sink', async () => {
      const logger = createMockLogger();
      const publisher = new EventPublisher(logger, [
        {
          write: () => Promise.reject(new Error('sink down')),
        },
      ]);

      publisher.publish(record(run.id, 4));
      await vi.waitFor(() =>
        expect(logger.warn).toHaveBeenCalledWith({ runId: run.id, sequenceNum: 4, error: 'sink down' }, 'Event sink failed')
      );
    });
  });

  describe('follow', () => {
    it('should replay stored events then tail live ones until done', async () => {
      await append(stepDelta('a'));
      await append(stepDelta('b'));

      const followed = collect(engine.events.follow(run.id));
      await append(stepDelta('c'));
      await append(DONE);

      expect(sequences(await followed)).toEqual([1, 2, 3, 4]);
    });

    it('should start after the given sequence number', async () => {
      await append(stepDelta('a'));
      await append(stepDelta('b'));
      await append(DONE);

      expect(sequences(await collect(engine.events.follow(run.id, 1)))).toEqual([2, 3]);
    });

    it('should stop when the signal aborts', async () => {
      const controller = new AbortController();
      const followed = collect(engine.events.follow(run.id, 0, controller.signal));
      await append(stepDelta('a'));
      await vi.waitFor(() => expect(engine.publisher.listenerCount(run.id)).toBe(1));

      controller.abort();

      expect(sequences(await followed)).toEqual([1]);
      expect(engine.publisher.listenerCount(run.id)).toBe(0);
    });

    it('should yield events seen both live and in the replay once', async () => {
      let listener: ((item: EventRecord) => void) | undefined;
      const source: EventSource = {
        subscribe: (_runId, next) => {
          listener = next;
          return () => {
            listener = undefined;
          };
        },
        async *replay(runId) {
          // Event 2 is published while the replay is still reading.
          listener?.(record(runId, 2));
          yield record(runId, 1);
          yield record(runId, 2);
          setTimeout(() => listener?.(record(runId, 3, 'done')), 0);
        },
      };

      expect(sequences(await collect(followEvents(source, 'run_1')))).toEqual([1, 2, 3]);
    });
  });
});
