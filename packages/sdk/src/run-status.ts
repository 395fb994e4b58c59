import { InvalidArgumentError, InvalidStateError } from './errors.js';
import {
  runStatusSchema,
  type Run,
  type RunError,
  type RunStatus,
  type RunStep,
  type RunStepStatus,
} from './schemas/runs.js';

export type RunTimestamps = Pick<
  Run,
  | 'startedAt'
  | 'completedAt'
  | 'failedAt'
  | 'cancelledAt'
  | 'triedCancellingAt'
  | 'expiresAt'
>;

const TERMINAL_STATUSES: ReadonlySet<RunStatus> = new Set([
  'cancelled',
  'completed',
  'failed',
  'expired',
]);

/**
 * Status is never stored. It is derived from the timestamps in the order
 * cancelled > failed > completed > expired > cancelling > in_progress > queued.
 */
export function getRunStatus(run: RunTimestamps, at: Date = new Date()): RunStatus {
  if (run.cancelledAt) return 'cancelled';
  if (run.failedAt) return 'failed';
  if (run.completedAt) return 'completed';
  if (run.expiresAt.getTime() <= at.getTime()) return 'expired';
  if (run.triedCancellingAt) return 'cancelling';
  if (run.startedAt) return 'in_progress';
  return 'queued';
}

export function isTerminalStatus(status: RunStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

function terminalTimestampCount(run: RunTimestamps): number {
  return [run.completedAt, run.failedAt, run.cancelledAt].filter(Boolean).length;
}

function assertSingleTerminal<T extends RunTimestamps>(run: T): T {
  if (terminalTimestampCount(run) > 1) {
    throw new InvalidStateError('A run can record only one terminal timestamp');
  }
  return run;
}

function assertStatus(run: Run, allowed: RunStatus[], action: string, at: Date): void {
  const status = getRunStatus(run, at);
  if (!allowed.includes(status)) {
    throw new InvalidStateError(`Cannot ${action} run ${run.id} with status '${status}'`);
  }
}

export function startRun(run: Run, at: Date): Run {
  if (terminalTimestampCount(run) > 0) {
    throw new InvalidStateError(`Cannot start run ${run.id}: it already finished`);
  }
  if (run.startedAt) {
    throw new InvalidStateError(`Run ${run.id} was already started`);
  }
  return assertSingleTerminal({ ...run, startedAt: at });
}

export function completeRun(run: Run, at: Date): Run {
  assertStatus(run, ['in_progress'], 'complete', at);
  return assertSingleTerminal({ ...run, completedAt: at });
}

export function failRun(run: Run, error: RunError, at: Date): Run {
  assertStatus(run, ['queued', 'in_progress'], 'fail', at);
  return assertSingleTerminal({ ...run, failedAt: at, lastError: error });
}

export function requestCancel(run: Run, at: Date): Run {
  const status = getRunStatus(run, at);
  if (isTerminalStatus(status)) {
    throw new InvalidStateError(`Cannot cancel run ${run.id} with status '${status}'`);
  }
  if (run.triedCancellingAt) return run;
  return { ...run, triedCancellingAt: at };
}

export function confirmCancel(run: Run, at: Date): Run {
  assertStatus(run, ['cancelling'], 'confirm cancellation of', at);
  return assertSingleTerminal({ ...run, cancelledAt: at });
}

/**
 * The only external mutation of a run. Requesting `cancelling` or `cancelled`
 * records a cancel request; the owning task confirms it.
 */
export function modifyRun(run: Run, patch: Record<string, unknown>, at: Date): Run {
  const disallowed = Object.keys(patch).filter((key) => key !== 'status');
  if (disallowed.length > 0) {
    throw new InvalidArgumentError(`Run fields cannot be modified: ${disallowed.join(', ')}`);
  }
  const parsed = runStatusSchema.safeParse(patch.status);
  if (!parsed.success) {
    throw new InvalidArgumentError(`Invalid run status: ${String(patch.status)}`);
  }
  const target = parsed.data;
  const current = getRunStatus(run, at);
  if (target === current) return run;
  if (target === 'cancelling' || target === 'cancelled') {
    return requestCancel(run, at);
  }
  throw new InvalidStateError(`Cannot change run ${run.id} from '${current}' to '${target}'`);
}

export type RunStepTimestamps = Pick<RunStep, 'completedAt' | 'failedAt' | 'cancelledAt' | 'expiredAt'>;

/** A step is in progress until one of its terminal timestamps is set. */
export function getRunStepStatus(step: RunStepTimestamps): RunStepStatus {
  if (step.completedAt) return 'completed';
  if (step.failedAt) return 'failed';
  if (step.cancelledAt) return 'cancelled';
  if (step.expiredAt) return 'expired';
  return 'in_progress';
}
