import {
  ID_PREFIXES,
  InvalidStateError,
  ROOT_MESSAGE_PARENT_ID,
  UpstreamError,
  addPrefix,
  childLogger,
  completeRun,
  confirmCancel,
  errorMessage,
  failRun,
  generateId,
  getRunStatus,
  isTerminalStatus,
  now,
  requestCancel,
  startRun,
  toMessageObject,
  toRunObject,
  toRunStepObject,
  type ContentBlock,
  type Logger,
  type Message,
  type MessageRole,
  type Run,
  type RunError,
  type RunStatus,
  type RunStep,
  type RunStepDetails,
  type RunStepEventType,
  type ThreadEvent,
} from '@threadline/sdk';
import type { AssistantRepository, RunRepository, RunStepRepository } from '@threadline/db';
import type { AgentRegistry, AgentSession, MessageWriter, ToolCallHandle } from './agents.js';
import type { EventLog } from './event-log.js';
import type { MessageTreeStore } from './message-tree.js';

export interface RunRunnerDeps {
  runs: RunRepository;
  runSteps: RunStepRepository;
  assistants: AssistantRepository;
  tree: MessageTreeStore;
  events: EventLog;
  agents: AgentRegistry;
  logger: Logger;
}

function toolCallDetails(callId: string, name: string, args: string, output: string | null): RunStepDetails {
  return {
    type: 'tool_calls',
    tool_calls: [{ id: callId, type: 'function', function: { name, arguments: args, output } }],
  };
}

type StepOutcome = 'failed' | 'cancelled' | 'expired';

const STEP_OUTCOME_EVENTS = {
  failed: 'thread.run.step.failed',
  cancelled: 'thread.run.step.cancelled',
  expired: 'thread.run.step.expired',
} as const satisfies Record<StepOutcome, RunStepEventType>;

const UNFINISHED_STEP_ERROR: RunError = {
  code: 'server_error',
  message: 'The run ended before the tool call finished',
};

function closeStep(step: RunStep, outcome: StepOutcome, at: Date, error: RunError): RunStep {
  switch (outcome) {
    case 'failed':
      return { ...step, failedAt: at, lastError: error };
    case 'cancelled':
      return { ...step, cancelledAt: at };
    case 'expired':
      return { ...step, expiredAt: at };
  }
}

function toRunError(error: unknown): RunError {
  return {
    code: error instanceof UpstreamError ? 'upstream_error' : 'server_error',
    message: errorMessage(error),
  };
}

/** Tool-call steps of one execution that have not finished yet, by id. */
type OpenSteps = Map<string, RunStep>;

/** The agent's view of one executing run. */
class RunSession implements AgentSession {
  private parentId: string;

  constructor(
    private readonly deps: RunRunnerDeps,
    private readonly run: Run,
    history: Message[],
    private readonly signal: AbortSignal,
    private readonly openSteps: OpenSteps
  ) {
    this.parentId = history[history.length - 1]?.id ?? ROOT_MESSAGE_PARENT_ID;
  }

  private emit(event: ThreadEvent) {
    return this.deps.events.append(this.run.id, this.run.threadId, event);
  }

  async shouldContinue(): Promise<boolean> {
    if (this.signal.aborted) return false;
    const run = await this.deps.runs.findOne(this.run.id);
    return getRunStatus(run) === 'in_progress';
  }

  private async persistMessage(role: MessageRole, content: ContentBlock[], id?: string): Promise<Message> {
    const message = await this.deps.tree.createMessage(this.run.threadId, {
      id,
      parentId: this.parentId,
      role,
      content,
      assistantId: this.run.assistantId,
      runId: this.run.id,
    });
    this.parentId = message.id;
    await this.emit({ event: 'thread.message.created', data: toMessageObject(message) });
    return message;
  }

  async emitMessage({ role, content }: { role: MessageRole; content: ContentBlock[] }): Promise<boolean> {
    await this.persistMessage(role, content);
    return this.shouldContinue();
  }

  streamMessage(role: MessageRole): MessageWriter {
    const id = generateId(ID_PREFIXES.message);
    let text = '';
    let finished: Message | undefined;

    return {
      id,
      write: async (chunk) => {
        if (finished) throw new InvalidStateError(`Message ${id} is already finished`);
        text += chunk;
        await this.emit({
          event: 'thread.message.delta',
          data: {
            id,
            object: 'thread.message.delta',
            delta: { role, content: [{ index: 0, type: 'text', text: chunk }] },
          },
        });
      },
      finish: async () => {
        finished ??= await this.persistMessage(role, [{ type: 'text', text }], id);
        return finished;
      },
    };
  }

  async startToolCall({ name, arguments: initial }: { name: string; arguments: string }): Promise<ToolCallHandle> {
    const callId = addPrefix('call', generateId(ID_PREFIXES.runStep));
    let args = initial;
    let step: RunStep = {
      id: generateId(ID_PREFIXES.runStep),
      runId: this.run.id,
      threadId: this.run.threadId,
      assistantId: this.run.assistantId,
      type: 'tool_calls',
      stepDetails: toolCallDetails(callId, name, args, null),
      createdAt: now(),
      completedAt: null,
      failedAt: null,
      cancelledAt: null,
      expiredAt: null,
      lastError: null,
    };
    await this.deps.runSteps.create(step);
    this.openSteps.set(step.id, step);
    await this.emit({ event: 'thread.run.step.created', data: toRunStepObject(step) });
    await this.emit({ event: 'thread.run.step.in_progress', data: toRunStepObject(step) });

    return {
      stepId: step.id,
      callId,
      appendArguments: async (chunk) => {
        args += chunk;
        await this.emit({
          event: 'thread.run.step.delta',
          data: {
            id: step.id,
            object: 'thread.run.step.delta',
            delta: {
              step_details: {
                type: 'tool_calls',
                tool_calls: [{ index: 0, type: 'function', function: { arguments: chunk } }],
              },
            },
          },
        });
      },
      complete: async (output) => {
        step = {
          ...step,
          completedAt: now(),
          stepDetails: toolCallDetails(callId, name, args, output),
        };
        await this.deps.runSteps.update(step);
        this.openSteps.delete(step.id);
        await this.emit({ event: 'thread.run.step.completed', data: toRunStepObject(step) });
      },
      fail: async (message) => {
        step = {
          ...step,
          failedAt: now(),
          lastError: { code: 'server_error', message },
          stepDetails: toolCallDetails(callId, name, args, null),
        };
        await this.deps.runSteps.update(step);
        this.openSteps.delete(step.id);
        await this.emit({ event: 'thread.run.step.failed', data: toRunStepObject(step) });
      },
    };
  }
}

/**
 * Executes one run from its current state to a terminal event. Cancellation
 * and expiry are cooperative: the agent observes them through its session
 * and the runner settles the run once the agent returns.
 */
export class RunRunner {
  constructor(private readonly deps: RunRunnerDeps) {}

  private emit(run: Run, event: ThreadEvent) {
    return this.deps.events.append(run.id, run.threadId, event);
  }

  /**
   * Never rejects. Returns the final status, or null when the run could not
   * be read or its log could not be closed.
   */
  async execute(runId: string, signal: AbortSignal): Promise<RunStatus | null> {
    const logger = childLogger(this.deps.logger, { runId });
    let run: Run;
    try {
      run = await this.deps.runs.findOne(runId);
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Run execution failed');
      return null;
    }

    const openSteps: OpenSteps = new Map();
    try {
      return await this.drive(run, signal, logger, openSteps);
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Run execution failed');
      return this.abandon(run, error, logger, openSteps);
    }
  }

  /** Records a cancel request that no task is going to observe. */
  async confirmCancellation(run: Run): Promise<Run> {
    const cancelled = confirmCancel(run, now());
    await this.deps.runs.update(cancelled);
    await this.emit(cancelled, { event: 'thread.run.cancelled', data: toRunObject(cancelled) });
    await this.emit(cancelled, { event: 'done', data: '[DONE]' });
    return cancelled;
  }

  private async drive(stored: Run, signal: AbortSignal, logger: Logger, openSteps: OpenSteps): Promise<RunStatus> {
    const { runs, assistants, tree, events, agents } = this.deps;
    const runId = stored.id;
    let run = stored;
    const status = getRunStatus(run);

    if (await events.isClosed(runId)) {
      logger.warn({ status }, 'Run log is already closed');
      return status;
    }
    if (status === 'cancelling') {
      await this.confirmCancellation(run);
      return 'cancelled';
    }
    if (status === 'expired') {
      await this.emit(run, { event: 'thread.run.expired', data: toRunObject(run) });
      await this.emit(run, { event: 'done', data: '[DONE]' });
      return 'expired';
    }
    if (isTerminalStatus(status)) {
      await this.emit(run, { event: 'done', data: '[DONE]' });
      return status;
    }

    run = startRun(run, now());
    await runs.update(run);
    await this.emit(run, { event: 'thread.run.in_progress', data: toRunObject(run) });
    logger.info('Run started');

    try {
      const assistant = await assistants.findOne(run.assistantId);
      const history = await tree.mainBranch(run.threadId);
      const session = new RunSession(this.deps, run, history, signal, openSteps);
      await agents.resolve(run.assistantId).act({ run, assistant, history, signal, logger }, session);
    } catch (error) {
      const current = await runs.findOne(runId);
      const currentStatus = getRunStatus(current);
      if (currentStatus !== 'cancelling' && currentStatus !== 'expired' && !signal.aborted) {
        return this.fail(current, error, logger, openSteps);
      }
      logger.info({ status: currentStatus, error: errorMessage(error) }, 'Agent stopped after interruption');
    }

    return this.settle(runId, signal, openSteps);
  }

  /** Finishes steps the agent left open, emitting one step event each. */
  private async closeSteps(
    run: Run,
    openSteps: OpenSteps,
    outcome: StepOutcome,
    error: RunError = UNFINISHED_STEP_ERROR
  ): Promise<void> {
    const at = now();
    for (const open of [...openSteps.values()]) {
      const step = closeStep(open, outcome, at, error);
      await this.deps.runSteps.update(step);
      openSteps.delete(step.id);
      await this.emit(run, { event: STEP_OUTCOME_EVENTS[outcome], data: toRunStepObject(step) });
    }
  }

  private async fail(run: Run, error: unknown, logger: Logger, openSteps: OpenSteps): Promise<RunStatus> {
    const runError = toRunError(error);
    logger.warn({ error: runError }, 'Agent failed');
    await this.closeSteps(run, openSteps, 'failed', runError);
    const failed = failRun(run, runError, now());
    await this.deps.runs.update(failed);
    await this.emit(failed, { event: 'thread.run.failed', data: toRunObject(failed) });
    await this.emit(failed, { event: 'error', data: runError });
    return 'failed';
  }

  private async settle(runId: string, signal: AbortSignal, openSteps: OpenSteps): Promise<RunStatus> {
    let run = await this.deps.runs.findOne(runId);
    let status = getRunStatus(run);
    // An abort with no recorded request: the request lost a write race with
    // `startRun`, or the scheduler is shutting down.
    if (status === 'in_progress' && signal.aborted) {
      run = requestCancel(run, now());
      status = 'cancelling';
    }

    switch (status) {
      case 'in_progress': {
        await this.closeSteps(run, openSteps, 'failed');
        const completed = completeRun(run, now());
        await this.deps.runs.update(completed);
        await this.emit(completed, { event: 'thread.run.completed', data: toRunObject(completed) });
        break;
      }
      case 'cancelling': {
        await this.closeSteps(run, openSteps, 'cancelled');
        await this.emit(run, { event: 'thread.run.cancelling', data: toRunObject(run) });
        const cancelled = confirmCancel(run, now());
        await this.deps.runs.update(cancelled);
        await this.emit(cancelled, { event: 'thread.run.cancelled', data: toRunObject(cancelled) });
        break;
      }
      case 'expired':
        await this.closeSteps(run, openSteps, 'expired');
        await this.emit(run, { event: 'thread.run.expired', data: toRunObject(run) });
        break;
      default:
        break;
    }

    await this.emit(run, { event: 'done', data: '[DONE]' });
    if (status === 'in_progress') return 'completed';
    if (status === 'cancelling') return 'cancelled';
    return status;
  }

  /**
   * Last resort after an unexpected failure, usually storage. Records the run
   * as failed (or cancelled when a request is pending) and closes its log so
   * followers see a terminal event. Each write guards its own failure.
   */
  private async abandon(
    run: Run,
    error: unknown,
    logger: Logger,
    openSteps: OpenSteps
  ): Promise<RunStatus | null> {
    const runError = toRunError(error);
    const at = now();

    let current = run;
    try {
      current = await this.deps.runs.findOne(run.id);
    } catch (readError) {
      logger.warn({ error: errorMessage(readError) }, 'Could not re-read abandoned run');
    }

    const outcome: StepOutcome = getRunStatus(current, at) === 'cancelling' ? 'cancelled' : 'failed';
    try {
      await this.closeSteps(current, openSteps, outcome, runError);
    } catch (stepError) {
      logger.warn({ error: errorMessage(stepError) }, 'Could not close open run steps');
    }

    let final = current;
    const status = getRunStatus(current, at);
    if (status === 'cancelling') {
      final = confirmCancel(current, at);
    } else if (status === 'queued' || status === 'in_progress') {
      final = failRun(current, runError, at);
    }
    if (final !== current) {
      try {
        await this.deps.runs.update(final);
      } catch (updateError) {
        logger.error({ error: errorMessage(updateError) }, 'Could not record abandoned run');
      }
    }
    const finalStatus = getRunStatus(final, at);

    try {
      if (await this.deps.events.isClosed(run.id)) return finalStatus;
    } catch (logError) {
      logger.error({ error: errorMessage(logError) }, 'Could not read run log state');
      return null;
    }

    const events: ThreadEvent[] = [];
    switch (finalStatus) {
      case 'failed':
        events.push({ event: 'thread.run.failed', data: toRunObject(final) }, { event: 'error', data: runError });
        break;
      case 'cancelled':
        events.push({ event: 'thread.run.cancelled', data: toRunObject(final) }, { event: 'done', data: '[DONE]' });
        break;
      case 'expired':
        events.push({ event: 'thread.run.expired', data: toRunObject(final) }, { event: 'done', data: '[DONE]' });
        break;
      default:
        events.push({ event: 'done', data: '[DONE]' });
    }

    let closed = false;
    for (const event of events) {
      try {
        await this.emit(final, event);
        closed = event.event === 'error' || event.event === 'done';
      } catch (appendError) {
        logger.error({ event: event.event, error: errorMessage(appendError) }, 'Could not append to abandoned run log');
      }
    }
    return closed ? finalStatus : null;
  }
}
