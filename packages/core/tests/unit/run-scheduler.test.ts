/**
 * Unit tests for the run scheduler
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { InvalidStateError, addSeconds, now, type Logger, type Run, type RunStatus } from '@threadline/sdk';
import { RunScheduler, type RunExecutor } from '../../src/run-scheduler.js';
import { buildRun, createMockLogger } from '../test-utils.js';

/** Resolves with 'cancelled' once the task's signal aborts. */
function untilAborted(signal: AbortSignal): Promise<RunStatus | null> {
  return new Promise((resolve) => {
    signal.addEventListener('abort', () => resolve('cancelled'), { once: true });
  });
}

describe('RunScheduler [unit]', () => {
  let logger: Logger;
  let execute: Mock<RunExecutor['execute']>;
  let scheduler: RunScheduler;
  let run: Run;

  beforeEach(() => {
    logger = createMockLogger();
    execute = vi.fn<RunExecutor['execute']>();
    scheduler = new RunScheduler({ execute }, logger, { sweepIntervalMs: 50 });
    run = buildRun('thread_1', 'asst_1');
  });

  afterEach(() => {
    scheduler.stop();
  });

  it('should execute a scheduled run and log its outcome', async () => {
    execute.mockResolvedValue('completed');

    expect(scheduler.schedule(run)).toBe(true);
    expect(scheduler.isActive(run.id)).toBe(true);
    await scheduler.wait(run.id);

    expect(execute).toHaveBeenCalledWith(run.id, expect.any(AbortSignal));
    expect(logger.info).toHaveBeenCalledWith({ runId: run.id, status: 'completed' }, 'Run finished');
    expect(scheduler.isActive(run.id)).toBe(false);
  });

  it('should keep a single task per run', async () => {
    execute.mockImplementation((_runId, signal) => untilAborted(signal));

    expect(scheduler.schedule(run)).toBe(true);
    expect(scheduler.schedule(run)).toBe(false);
    scheduler.signalCancel(run.id);
    await scheduler.wait(run.id);

    expect(execute).toHaveBeenCalledTimes(1);
  });

  it('should abort the task signal on cancel', async () => {
    execute.mockImplementation((_runId, signal) => untilAborted(signal));
    scheduler.schedule(run);

    expect(scheduler.signalCancel(run.id)).toBe(true);
    await scheduler.wait(run.id);

    expect(logger.info).toHaveBeenCalledWith({ runId: run.id, status: 'cancelled' }, 'Run finished');
    expect(scheduler.signalCancel(run.id)).toBe(false);
  });

  it('should abort only tasks past their expiry', async () => {
    execute.mockImplementation((_runId, signal) => untilAborted(signal));
    const expired = buildRun('thread_1', 'asst_1', { expiresAt: addSeconds(now(), -5) });
    scheduler.schedule(expired);
    scheduler.schedule(run);

    expect(scheduler.sweep()).toEqual([expired.id]);
    await scheduler.wait(expired.id);

    expect(scheduler.isActive(expired.id)).toBe(false);
    expect(scheduler.isActive(run.id)).toBe(true);
    scheduler.signalCancel(run.id);
    await scheduler.wait(run.id);
  });

  it('should sweep on an interval once started', async () => {
    execute.mockImplementation((_runId, signal) => untilAborted(signal));
    const expired = buildRun('thread_1', 'asst_1', { expiresAt: addSeconds(now(), -5) });
    scheduler.schedule(expired);

    scheduler.start();

    await vi.waitFor(() => expect(scheduler.isActive(expired.id)).toBe(false));
  });

  it('should wait for active runs when draining', async () => {
    let finish: (status: RunStatus) => void = () => undefined;
    execute.mockImplementation(
      () =>
        new Promise<RunStatus>((resolve) => {
          finish = resolve;
        })
    );
    scheduler.schedule(run);
    await vi.waitFor(() => expect(execute).toHaveBeenCalled());

    const drained = scheduler.drain(1_000);
    finish('completed');

    expect(await drained).toBe(true);
    expect(scheduler.activeCount).toBe(0);
  });

  it('should abort runs still active after the drain timeout', async () => {
    execute.mockImplementation((_runId, signal) => untilAborted(signal));
    scheduler.schedule(run);

    expect(await scheduler.drain(10)).toBe(false);
    await scheduler.wait(run.id);

    expect(logger.warn).toHaveBeenCalledWith({ runIds: [run.id] }, 'Aborting runs still active at shutdown');
  });

  it('should refuse new runs once draining', async () => {
    await scheduler.drain(10);

    expect(() => scheduler.schedule(run)).toThrow(InvalidStateError);
  });

  describe('waitFor', () => {
    it('should resolve true once the runs settle', async () => {
      execute.mockImplementation((_runId, signal) => untilAborted(signal));
      scheduler.schedule(run);
      await vi.waitFor(() => expect(execute).toHaveBeenCalled());

      const waiting = scheduler.waitFor([run.id, 'run_unknown'], 1000);
      scheduler.signalCancel(run.id);

      expect(await waiting).toBe(true);
      expect(scheduler.isActive(run.id)).toBe(false);
    });

    it('should resolve false when a run outlives the timeout', async () => {
      execute.mockImplementation((_runId, signal) => untilAborted(signal));
      scheduler.schedule(run);

      expect(await scheduler.waitFor([run.id], 10)).toBe(false);
      expect(scheduler.isActive(run.id)).toBe(true);

      scheduler.signalCancel(run.id);
      await scheduler.wait(run.id);
    });

    it('should resolve true at once without active runs', async () => {
      expect(await scheduler.waitFor([run.id], 0)).toBe(true);
    });
  });
});

