import { appendFile, mkdir, readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import {
  KeyedLock,
  NotFoundError,
  StorageError,
  errorMessage,
  getRunStatus,
  isTerminalStatus,
  isVisibleTo,
  messageSchema,
  paginate,
  parseEventRecord,
  runSchema,
  runStepSchema,
  threadSchema,
  type EventRecord,
  type ListQuery,
  type ListResponse,
  type Message,
  type Run,
  type RunStep,
  type Thread,
} from '@threadline/sdk';
import { existsQuietly } from '../exists.js';
import type {
  EventRepository,
  MessageRepository,
  RunFilter,
  RunRepository,
  RunStepFilter,
  RunStepRepository,
  ThreadRepository,
  ThreadScope,
  WorkspaceFilter,
} from '../types.js';
import type { FileExecutionRepository } from './resources.js';
import {
  JsonFileStore,
  errnoCode,
  listDirectories,
  pathExists,
  pathSegment,
  serializeEntity,
} from './store.js';

/**
 * Layout under `<dataDir>/threads`:
 *   <threadId>.json
 *   <threadId>/messages/<messageId>.json
 *   <threadId>/runs/<runId>.json
 *   <threadId>/events/<runId>.jsonl
 *   <threadId>/steps/<runId>/<stepId>.json
 */
export class ThreadLayout {
  readonly root: string;

  constructor(dataDir: string) {
    this.root = join(dataDir, 'threads');
  }

  threadDir(threadId: string): string {
    return join(this.root, pathSegment('Thread', threadId));
  }

  messagesDir(threadId: string): string {
    return join(this.threadDir(threadId), 'messages');
  }

  runsDir(threadId: string): string {
    return join(this.threadDir(threadId), 'runs');
  }

  eventsFile(threadId: string, runId: string): string {
    return join(this.threadDir(threadId), 'events', `${pathSegment('Run', runId)}.jsonl`);
  }

  stepsRoot(threadId: string): string {
    return join(this.threadDir(threadId), 'steps');
  }

  stepsDir(threadId: string, runId: string): string {
    return join(this.stepsRoot(threadId), pathSegment('Run', runId));
  }

  threadIds(): Promise<string[]> {
    return listDirectories(this.root);
  }
}

export class FileThreadRepository implements ThreadRepository {
  private readonly store = new JsonFileStore<Thread>(threadSchema, 'Thread');

  constructor(
    private readonly layout: ThreadLayout,
    private readonly executions: FileExecutionRepository
  ) {}

  create(thread: Thread): Promise<Thread> {
    return this.store.create(this.layout.root, thread);
  }

  async findOne(id: string, filters?: WorkspaceFilter): Promise<Thread> {
    const thread = await this.store.read(this.layout.root, id);
    if (!isVisibleTo(thread, filters?.workspaceId)) throw NotFoundError.forResource('Thread', id);
    return thread;
  }

  update(thread: Thread): Promise<Thread> {
    return this.store.write(this.layout.root, thread);
  }

  async delete(id: string, filters?: WorkspaceFilter): Promise<void> {
    await this.findOne(id, filters);
    for (const execution of await this.executions.all({ threadId: id })) {
      await this.executions.delete(execution.id);
    }
    try {
      await rm(this.layout.threadDir(id), { recursive: true, force: true });
    } catch (error) {
      throw new StorageError(`Failed to delete thread ${id}: ${errorMessage(error)}`, { cause: error });
    }
    await this.store.remove(this.layout.root, id);
  }

  async find(query: ListQuery, filters?: WorkspaceFilter): Promise<ListResponse<Thread>> {
    const threads = await this.store.list(this.layout.root);
    return paginate(
      threads.filter((thread) => isVisibleTo(thread, filters?.workspaceId)),
      query,
      (thread) => thread.id
    );
  }

  exists(id: string, filters?: WorkspaceFilter): Promise<boolean> {
    return existsQuietly(() => this.findOne(id, filters));
  }
}

export class FileMessageRepository implements MessageRepository {
  private readonly store = new JsonFileStore<Message>(messageSchema, 'Message');

  constructor(private readonly layout: ThreadLayout) {}

  async create(message: Message): Promise<Message> {
    return this.store.create(this.layout.messagesDir(message.threadId), message);
  }

  async findOne(id: string, scope?: ThreadScope): Promise<Message> {
    const threadIds = scope ? [scope.threadId] : await this.layout.threadIds();
    for (const threadId of threadIds) {
      const message = await this.store.readIfExists(this.layout.messagesDir(threadId), id);
      if (message) return message;
    }
    throw NotFoundError.forResource('Message', id);
  }

  async update(message: Message): Promise<Message> {
    return this.store.write(this.layout.messagesDir(message.threadId), message);
  }

  async delete(id: string, scope?: ThreadScope): Promise<void> {
    const message = await this.findOne(id, scope);
    await this.store.remove(this.layout.messagesDir(message.threadId), id);
  }

  async deleteMany(threadId: string, ids: string[]): Promise<void> {
    for (const id of ids) {
      await this.store.remove(this.layout.messagesDir(threadId), id);
    }
  }

  async find(query: ListQuery, scope?: ThreadScope): Promise<ListResponse<Message>> {
    const threadIds = scope ? [scope.threadId] : await this.layout.threadIds();
    const messages: Message[] = [];
    for (const threadId of threadIds) {
      messages.push(...(await this.store.list(this.layout.messagesDir(threadId))));
    }
    return paginate(messages, query, (message) => message.id);
  }

  async findByThread(threadId: string): Promise<Message[]> {
    return this.store.list(this.layout.messagesDir(threadId));
  }

  exists(id: string, scope?: ThreadScope): Promise<boolean> {
    return existsQuietly(() => this.findOne(id, scope));
  }
}

export class FileRunRepository implements RunRepository {
  private readonly store = new JsonFileStore<Run>(runSchema, 'Run');
  private readonly writes = new KeyedLock();

  constructor(private readonly layout: ThreadLayout) {}

  async create(run: Run): Promise<Run> {
    return this.store.create(this.layout.runsDir(run.threadId), run);
  }

  async findOne(id: string, filters?: RunFilter): Promise<Run> {
    const threadIds = filters?.threadId ? [filters.threadId] : await this.layout.threadIds();
    for (const threadId of threadIds) {
      const run = await this.store.readIfExists(this.layout.runsDir(threadId), id);
      if (run) return run;
    }
    throw NotFoundError.forResource('Run', id);
  }

  update(run: Run): Promise<Run> {
    return this.writes.run(run.id, () => this.store.write(this.layout.runsDir(run.threadId), run));
  }

  /** The read and the write share the run's write queue, so no update lands between them. */
  requestCancel(id: string, at: Date): Promise<Run> {
    return this.writes.run(id, async () => {
      const run = await this.findOne(id);
      if (run.triedCancellingAt || isTerminalStatus(getRunStatus(run, at))) return run;
      return this.store.write(this.layout.runsDir(run.threadId), { ...run, triedCancellingAt: at });
    });
  }

  async delete(id: string, filters?: RunFilter): Promise<void> {
    const run = await this.findOne(id, filters);
    await rm(this.layout.eventsFile(run.threadId, run.id), { force: true });
    await rm(this.layout.stepsDir(run.threadId, run.id), { recursive: true, force: true });
    await this.store.remove(this.layout.runsDir(run.threadId), id);
  }

  async find(query: ListQuery, filters?: RunFilter): Promise<ListResponse<Run>> {
    const threadIds = filters?.threadId ? [filters.threadId] : await this.layout.threadIds();
    const runs: Run[] = [];
    for (const threadId of threadIds) {
      runs.push(...(await this.store.list(this.layout.runsDir(threadId))));
    }
    return paginate(runs, query, (run) => run.id);
  }

  exists(id: string, filters?: RunFilter): Promise<boolean> {
    return existsQuietly(() => this.findOne(id, filters));
  }
}

export class FileRunStepRepository implements RunStepRepository {
  private readonly store = new JsonFileStore<RunStep>(runStepSchema, 'Run step');

  constructor(private readonly layout: ThreadLayout) {}

  async create(step: RunStep): Promise<RunStep> {
    return this.store.create(this.layout.stepsDir(step.threadId, step.runId), step);
  }

  async findOne(id: string, filters?: RunStepFilter): Promise<RunStep> {
    for (const dir of await this.directories(filters)) {
      const step = await this.store.readIfExists(dir, id);
      if (step) return step;
    }
    throw NotFoundError.forResource('Run step', id);
  }

  async update(step: RunStep): Promise<RunStep> {
    return this.store.write(this.layout.stepsDir(step.threadId, step.runId), step);
  }

  async delete(id: string, filters?: RunStepFilter): Promise<void> {
    const step = await this.findOne(id, filters);
    await this.store.remove(this.layout.stepsDir(step.threadId, step.runId), id);
  }

  async find(query: ListQuery, filters?: RunStepFilter): Promise<ListResponse<RunStep>> {
    const steps: RunStep[] = [];
    for (const dir of await this.directories(filters)) {
      steps.push(...(await this.store.list(dir)));
    }
    return paginate(steps, query, (step) => step.id);
  }

  exists(id: string, filters?: RunStepFilter): Promise<boolean> {
    return existsQuietly(() => this.findOne(id, filters));
  }

  /** One directory per run in scope. */
  private async directories(filters?: RunStepFilter): Promise<string[]> {
    const threadIds = filters?.threadId ? [filters.threadId] : await this.layout.threadIds();
    const dirs: string[] = [];
    for (const threadId of threadIds) {
      const runIds = filters?.runId ? [filters.runId] : await listDirectories(this.layout.stepsRoot(threadId));
      dirs.push(...runIds.map((runId) => this.layout.stepsDir(threadId, runId)));
    }
    return dirs;
  }
}

/** Events are NDJSON lines appended to one file per run. */
export class FileEventRepository implements EventRepository {
  private readonly threadByRun = new Map<string, string>();

  constructor(private readonly layout: ThreadLayout) {}

  async append(record: EventRecord): Promise<EventRecord> {
    const path = this.layout.eventsFile(record.threadId, record.runId);
    try {
      await mkdir(join(this.layout.threadDir(record.threadId), 'events'), { recursive: true });
      await appendFile(path, `${serializeEntity(record)}\n`);
    } catch (error) {
      throw new StorageError(`Failed to append event for run ${record.runId}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    this.threadByRun.set(record.runId, record.threadId);
    return record;
  }

  async list(runId: string, options: { afterSequence: number; limit: number }): Promise<EventRecord[]> {
    const records = await this.readAll(runId);
    return records
      .filter((record) => record.sequenceNum > options.afterSequence)
      .slice(0, options.limit);
  }

  async last(runId: string): Promise<EventRecord | undefined> {
    const records = await this.readAll(runId);
    return records[records.length - 1];
  }

  private async locate(runId: string): Promise<string | undefined> {
    const cached = this.threadByRun.get(runId);
    if (cached) return this.layout.eventsFile(cached, runId);
    for (const threadId of await this.layout.threadIds()) {
      const path = this.layout.eventsFile(threadId, runId);
      if (await pathExists(path)) {
        this.threadByRun.set(runId, threadId);
        return path;
      }
    }
    return undefined;
  }

  private async readAll(runId: string): Promise<EventRecord[]> {
    const path = await this.locate(runId);
    if (!path) return [];
    let raw: string;
    try {
      raw = await readFile(path, 'utf8');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') return [];
      throw new StorageError(`Failed to read events for run ${runId}: ${errorMessage(error)}`, { cause: error });
    }
    return raw
      .split('\n')
      .filter((line) => line.trim().length > 0)
      .map((line, index) => {
        try {
          return parseEventRecord(JSON.parse(line));
        } catch (error) {
          throw new StorageError(`Corrupt event at line ${index + 1} for run ${runId}: ${errorMessage(error)}`, {
            cause: error,
          });
        }
      })
      .sort((a, b) => a.sequenceNum - b.sequenceNum);
  }
}
