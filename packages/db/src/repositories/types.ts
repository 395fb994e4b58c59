import type {
  Assistant,
  EventRecord,
  Execution,
  FileObject,
  ListQuery,
  ListResponse,
  McpConfig,
  Message,
  Run,
  RunStep,
  Thread,
  Workflow,
} from '@threadline/sdk';

/**
 * Persistence contract shared by the relational and file backends.
 * `filters` narrow visibility: an entity outside them behaves as absent.
 */
export interface Repository<T extends { id: string }, F = undefined> {
  /** Throws ConflictError when the id already exists. */
  create(entity: T): Promise<T>;
  /** Throws NotFoundError when absent or filtered out. */
  findOne(id: string, filters?: F): Promise<T>;
  /** Full replace. Throws NotFoundError when absent. */
  update(entity: T): Promise<T>;
  /** Throws NotFoundError when absent; removes dependent entities. */
  delete(id: string, filters?: F): Promise<void>;
  find(query: ListQuery, filters?: F): Promise<ListResponse<T>>;
  exists(id: string, filters?: F): Promise<boolean>;
}

export interface WorkspaceFilter {
  workspaceId?: string | null;
}

export interface ThreadScope {
  threadId: string;
}

export interface RunFilter {
  threadId?: string;
}

export interface WorkflowFilter extends WorkspaceFilter {
  tags?: string[];
}

export interface ExecutionFilter extends WorkspaceFilter {
  workflowId?: string;
  threadId?: string;
}

export type ThreadRepository = Repository<Thread, WorkspaceFilter>;

export interface MessageRepository extends Repository<Message, ThreadScope> {
  /** Every message of the thread, ascending by id. */
  findByThread(threadId: string): Promise<Message[]>;
  deleteMany(threadId: string, ids: string[]): Promise<void>;
}

export interface RunRepository extends Repository<Run, RunFilter> {
  /**
   * Records a cancel request against the stored run, not a caller's copy:
   * `triedCancellingAt` is set only while the run has no terminal timestamp
   * and no earlier request. Returns the stored run either way.
   */
  requestCancel(id: string, at: Date): Promise<Run>;
}

export interface RunStepFilter {
  threadId?: string;
  runId?: string;
}

/** Steps are keyed by run; the file backend needs `threadId` on create and update. */
export type RunStepRepository = Repository<RunStep, RunStepFilter>;

export interface EventRepository {
  append(record: EventRecord): Promise<EventRecord>;
  /** Events with `sequenceNum > afterSequence`, ascending. */
  list(runId: string, options: { afterSequence: number; limit: number }): Promise<EventRecord[]>;
  last(runId: string): Promise<EventRecord | undefined>;
}

export type AssistantRepository = Repository<Assistant, WorkspaceFilter>;
export type WorkflowRepository = Repository<Workflow, WorkflowFilter>;
export type FileRepository = Repository<FileObject, WorkspaceFilter>;

export interface McpConfigRepository extends Repository<McpConfig, WorkspaceFilter> {
  count(filters?: WorkspaceFilter): Promise<number>;
}

export type ExecutionRepository = Repository<Execution, ExecutionFilter>;

export interface Repositories {
  threads: ThreadRepository;
  messages: MessageRepository;
  runs: RunRepository;
  runSteps: RunStepRepository;
  events: EventRepository;
  assistants: AssistantRepository;
  workflows: WorkflowRepository;
  files: FileRepository;
  mcpConfigs: McpConfigRepository;
  executions: ExecutionRepository;
}
