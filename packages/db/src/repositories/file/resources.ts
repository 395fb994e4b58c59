import { join } from 'node:path';
import {
  NotFoundError,
  assistantSchema,
  executionSchema,
  fileObjectSchema,
  isVisibleTo,
  mcpConfigSchema,
  paginate,
  workflowSchema,
  type Assistant,
  type Execution,
  type FileObject,
  type ListQuery,
  type ListResponse,
  type McpConfig,
  type Workflow,
  type WorkspaceScoped,
} from '@threadline/sdk';
import { existsQuietly } from '../exists.js';
import type {
  ExecutionFilter,
  McpConfigRepository,
  Repository,
  WorkflowFilter,
  WorkspaceFilter,
} from '../types.js';
import { JsonFileStore, type EntitySchema } from './store.js';

type Matcher<T, F> = (entity: T, filters: F | undefined) => boolean;

const visibleInWorkspace = <T extends WorkspaceScoped>(entity: T, filters: WorkspaceFilter | undefined) =>
  isVisibleTo(entity, filters?.workspaceId);

/** Workspace-scoped resource kept in `<dataDir>/<kind>/<id>.json`. */
export class FileResourceRepository<T extends { id: string } & WorkspaceScoped, F extends WorkspaceFilter>
  implements Repository<T, F>
{
  protected readonly store: JsonFileStore<T>;
  protected readonly dir: string;

  constructor(
    dataDir: string,
    kind: string,
    schema: EntitySchema<T>,
    private readonly label: string,
    private readonly matches: Matcher<T, F> = visibleInWorkspace
  ) {
    this.dir = join(dataDir, kind);
    this.store = new JsonFileStore(schema, label);
  }

  create(entity: T): Promise<T> {
    return this.store.create(this.dir, entity);
  }

  async findOne(id: string, filters?: F): Promise<T> {
    const entity = await this.store.read(this.dir, id);
    if (!this.matches(entity, filters)) throw NotFoundError.forResource(this.label, id);
    return entity;
  }

  update(entity: T): Promise<T> {
    return this.store.write(this.dir, entity);
  }

  async delete(id: string, filters?: F): Promise<void> {
    await this.findOne(id, filters);
    await this.store.remove(this.dir, id);
  }

  async find(query: ListQuery, filters?: F): Promise<ListResponse<T>> {
    const entities = await this.store.list(this.dir);
    return paginate(
      entities.filter((entity) => this.matches(entity, filters)),
      query,
      (entity) => entity.id
    );
  }

  exists(id: string, filters?: F): Promise<boolean> {
    return existsQuietly(() => this.findOne(id, filters));
  }

  async all(filters?: F): Promise<T[]> {
    const entities = await this.store.list(this.dir);
    return entities.filter((entity) => this.matches(entity, filters));
  }
}

export class FileAssistantRepository extends FileResourceRepository<Assistant, WorkspaceFilter> {
  constructor(dataDir: string) {
    super(dataDir, 'assistants', assistantSchema, 'Assistant');
  }
}

export class FileFileRepository extends FileResourceRepository<FileObject, WorkspaceFilter> {
  constructor(dataDir: string) {
    super(dataDir, 'files', fileObjectSchema, 'File');
  }
}

export class FileMcpConfigRepository
  extends FileResourceRepository<McpConfig, WorkspaceFilter>
  implements McpConfigRepository
{
  constructor(dataDir: string) {
    super(dataDir, 'mcp_configs', mcpConfigSchema, 'MCP config');
  }

  async count(filters?: WorkspaceFilter): Promise<number> {
    return (await this.all(filters)).length;
  }
}

export class FileWorkflowRepository extends FileResourceRepository<Workflow, WorkflowFilter> {
  constructor(dataDir: string) {
    super(dataDir, 'workflows', workflowSchema, 'Workflow', (workflow, filters) => {
      if (!isVisibleTo(workflow, filters?.workspaceId)) return false;
      const tags = filters?.tags ?? [];
      return tags.length === 0 || workflow.tags.some((tag) => tags.includes(tag));
    });
  }
}

export class FileExecutionRepository extends FileResourceRepository<Execution, ExecutionFilter> {
  constructor(dataDir: string) {
    super(dataDir, 'executions', executionSchema, 'Execution', (execution, filters) => {
      if (!isVisibleTo(execution, filters?.workspaceId)) return false;
      if (filters?.workflowId && execution.workflowId !== filters.workflowId) return false;
      if (filters?.threadId && execution.threadId !== filters.threadId) return false;
      return true;
    });
  }
}
