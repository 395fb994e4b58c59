import { InvalidStateError, errorMessage, type Logger, type Run, type RunStatus } from '@threadline/sdk';

/** Runs a single run to completion; must not reject. */
export interface RunExecutor {
  execute(runId: string, signal: AbortSignal): Promise<RunStatus | null>;
}

export interface RunSchedulerOptions {
  sweepIntervalMs?: number;
}

interface ActiveRun {
  controller: AbortController;
  expiresAt: Date;
  done: Promise<void>;
}

const DEFAULT_SWEEP_INTERVAL_MS = 30_000;

/**
 * Background execution of runs, one task per run, independent of the
 * request that created it.
 */
export class RunScheduler {
  private readonly active = new Map<string, ActiveRun>();
  private readonly sweepIntervalMs: number;
  private sweepTimer: NodeJS.Timeout | undefined;
  private accepting = true;

  constructor(
    private readonly executor: RunExecutor,
    private readonly logger: Logger,
    options: RunSchedulerOptions = {}
  ) {
    this.sweepIntervalMs = options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
  }

  /** Returns false when the run already has a task. */
  schedule(run: Run): boolean {
    if (!this.accepting) {
      throw new InvalidStateError('Scheduler is shutting down');
    }
    if (this.active.has(run.id)) return false;

    const controller = new AbortController();
    const done = Promise.resolve()
      .then(() => this.executor.execute(run.id, controller.signal))
      .then(
        (status) => {
          this.logger.info({ runId: run.id, status }, 'Run finished');
        },
        (error: unknown) => {
          this.logger.error({ runId: run.id, error: errorMessage(error) }, 'Run task failed');
        }
      )
      .finally(() => {
        this.active.delete(run.id);
      });

    this.active.set(run.id, { controller, expiresAt: run.expiresAt, done });
    return true;
  }

  isActive(runId: string): boolean {
    return this.active.has(runId);
  }

  get activeCount(): number {
    return this.active.size;
  }

  /** Aborts the task's signal; the task decides when to stop. */
  signalCancel(runId: string): boolean {
    const task = this.active.get(runId);
    if (!task) return false;
    task.controller.abort();
    return true;
  }

  /** Waits for a run's task, if it has one. */
  async wait(runId: string): Promise<void> {
    await this.active.get(runId)?.done;
  }

  start(): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => this.sweep(), this.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  stop(): void {
    if (this.sweepTimer) clearInterval(this.sweepTimer);
    this.sweepTimer = undefined;
  }

  /** Aborts tasks of runs past their expiry. Status stays derived on read. */
  sweep(at: Date = new Date()): string[] {
    const aborted: string[] = [];
    for (const [runId, task] of this.active) {
      if (task.expiresAt.getTime() <= at.getTime() && !task.controller.signal.aborted) {
        task.controller.abort();
        aborted.push(runId);
      }
    }
    if (aborted.length > 0) {
      this.logger.warn({ runIds: aborted }, 'Aborted expired runs');
    }
    return aborted;
  }

  /**
   * Waits for the tasks of `runIds` that are active. Returns false when some
   * are still running after `timeoutMs`.
   */
  async waitFor(runIds: Iterable<string>, timeoutMs: number): Promise<boolean> {
    const tasks: Promise<void>[] = [];
    for (const runId of runIds) {
      const task = this.active.get(runId);
      if (task) tasks.push(task.done);
    }
    if (tasks.length === 0) return true;

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), timeoutMs);
    });
    const settled = Promise.all(tasks).then(() => 'settled' as const);
    const result = await Promise.race([settled, timedOut]);
    clearTimeout(timer);
    return result === 'settled';
  }

  /**
   * Stops accepting runs and waits for active ones. Tasks still running
   * after `timeoutMs` are aborted; returns false in that case.
   */
  async drain(timeoutMs: number): Promise<boolean> {
    this.accepting = false;
    this.stop();
    if (await this.waitFor([...this.active.keys()], timeoutMs)) return true;

    this.logger.warn({ runIds: [...this.active.keys()] }, 'Aborting runs still active at shutdown');
    for (const task of this.active.values()) task.controller.abort();
    return false;
  }
}
