import { and, eq, type SQL } from 'drizzle-orm';
import {
  ID_PREFIXES,
  NotFoundError,
  addPrefix,
  stripPrefix,
  type Execution,
  type ListQuery,
  type ListResponse,
} from '@threadline/sdk';
import type { DbClient } from '../../client.js';
import { executions } from '../../schema/index.js';
import type { ExecutionFilter, ExecutionRepository } from '../types.js';
import { existsQuietly } from '../exists.js';
import { cursorOrder, cursorWhere, guard, toPage, workspaceVisible } from './shared.js';

type ExecutionRow = typeof executions.$inferSelect;

function toExecution(row: ExecutionRow): Execution {
  return {
    ...row,
    id: addPrefix(ID_PREFIXES.execution, row.id),
    workflowId: addPrefix(ID_PREFIXES.workflow, row.workflowId),
    threadId: addPrefix(ID_PREFIXES.thread, row.threadId),
    runId: addPrefix(ID_PREFIXES.run, row.runId),
  };
}

function toRow(execution: Execution): ExecutionRow {
  return {
    ...execution,
    id: stripPrefix(execution.id),
    workflowId: stripPrefix(execution.workflowId),
    threadId: stripPrefix(execution.threadId),
    runId: stripPrefix(execution.runId),
  };
}

function filterConditions(filters: ExecutionFilter | undefined): Array<SQL | undefined> {
  return [
    workspaceVisible(executions.workspaceId, filters?.workspaceId),
    filters?.workflowId ? eq(executions.workflowId, stripPrefix(filters.workflowId)) : undefined,
    filters?.threadId ? eq(executions.threadId, stripPrefix(filters.threadId)) : undefined,
  ];
}

export class RelationalExecutionRepository implements ExecutionRepository {
  constructor(private readonly db: DbClient) {}

  async create(execution: Execution): Promise<Execution> {
    guard('create execution', () => this.db.insert(executions).values(toRow(execution)).run());
    return execution;
  }

  async findOne(id: string, filters?: ExecutionFilter): Promise<Execution> {
    const row = guard('read execution', () =>
      this.db
        .select()
        .from(executions)
        .where(and(eq(executions.id, stripPrefix(id)), ...filterConditions(filters)))
        .get()
    );
    if (!row) throw NotFoundError.forResource('Execution', id);
    return toExecution(row);
  }

  async update(execution: Execution): Promise<Execution> {
    const { id, ...values } = toRow(execution);
    const result = guard('update execution', () =>
      this.db.update(executions).set(values).where(eq(executions.id, id)).run()
    );
    if (result.changes === 0) throw NotFoundError.forResource('Execution', execution.id);
    return execution;
  }

  async delete(id: string, filters?: ExecutionFilter): Promise<void> {
    await this.findOne(id, filters);
    guard('delete execution', () =>
      this.db.delete(executions).where(eq(executions.id, stripPrefix(id))).run()
    );
  }

  async find(query: ListQuery, filters?: ExecutionFilter): Promise<ListResponse<Execution>> {
    const rows = guard('list executions', () =>
      this.db
        .select()
        .from(executions)
        .where(and(...cursorWhere(executions.id, query), ...filterConditions(filters)))
        .orderBy(cursorOrder(executions.id, query))
        .limit(query.limit + 1)
        .all()
    );
    return toPage(rows.map(toExecution), query, (execution) => execution.id);
  }

  async exists(id: string, filters?: ExecutionFilter): Promise<boolean> {
    return existsQuietly(() => this.findOne(id, filters));
  }
}
