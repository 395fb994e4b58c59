import { and, eq, type SQL } from 'drizzle-orm';
import {
  ID_PREFIXES,
  NotFoundError,
  addPrefix,
  stripPrefix,
  type ListQuery,
  type ListResponse,
  type RunStep,
} from '@threadline/sdk';
import type { DbClient } from '../../client.js';
import { runSteps } from '../../schema/index.js';
import type { RunStepFilter, RunStepRepository } from '../types.js';
import { existsQuietly } from '../exists.js';
import { cursorOrder, cursorWhere, guard, toPage } from './shared.js';

type RunStepRow = typeof runSteps.$inferSelect;

function toRunStep(row: RunStepRow): RunStep {
  return {
    ...row,
    id: addPrefix(ID_PREFIXES.runStep, row.id),
    runId: addPrefix(ID_PREFIXES.run, row.runId),
    threadId: addPrefix(ID_PREFIXES.thread, row.threadId),
    assistantId: addPrefix(ID_PREFIXES.assistant, row.assistantId),
  };
}

function toRow(step: RunStep): RunStepRow {
  return {
    ...step,
    id: stripPrefix(step.id),
    runId: stripPrefix(step.runId),
    threadId: stripPrefix(step.threadId),
    assistantId: stripPrefix(step.assistantId),
  };
}

function scopeConditions(filters: RunStepFilter | undefined): SQL[] {
  const conditions: SQL[] = [];
  if (filters?.runId) conditions.push(eq(runSteps.runId, stripPrefix(filters.runId)));
  if (filters?.threadId) conditions.push(eq(runSteps.threadId, stripPrefix(filters.threadId)));
  return conditions;
}

export class RelationalRunStepRepository implements RunStepRepository {
  constructor(private readonly db: DbClient) {}

  async create(step: RunStep): Promise<RunStep> {
    guard('create run step', () => this.db.insert(runSteps).values(toRow(step)).run());
    return step;
  }

  async findOne(id: string, filters?: RunStepFilter): Promise<RunStep> {
    const row = guard('read run step', () =>
      this.db
        .select()
        .from(runSteps)
        .where(and(eq(runSteps.id, stripPrefix(id)), ...scopeConditions(filters)))
        .get()
    );
    if (!row) throw NotFoundError.forResource('Run step', id);
    return toRunStep(row);
  }

  async update(step: RunStep): Promise<RunStep> {
    const { id, ...values } = toRow(step);
    const result = guard('update run step', () =>
      this.db.update(runSteps).set(values).where(eq(runSteps.id, id)).run()
    );
    if (result.changes === 0) throw NotFoundError.forResource('Run step', step.id);
    return step;
  }

  async delete(id: string, filters?: RunStepFilter): Promise<void> {
    const step = await this.findOne(id, filters);
    guard('delete run step', () => this.db.delete(runSteps).where(eq(runSteps.id, stripPrefix(step.id))).run());
  }

  async find(query: ListQuery, filters?: RunStepFilter): Promise<ListResponse<RunStep>> {
    const rows = guard('list run steps', () =>
      this.db
        .select()
        .from(runSteps)
        .where(and(...cursorWhere(runSteps.id, query), ...scopeConditions(filters)))
        .orderBy(cursorOrder(runSteps.id, query))
        .limit(query.limit + 1)
        .all()
    );
    return toPage(rows.map(toRunStep), query, (step) => step.id);
  }

  async exists(id: string, filters?: RunStepFilter): Promise<boolean> {
    return existsQuietly(() => this.findOne(id, filters));
  }
}
