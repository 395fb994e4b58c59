import { and, eq, gt, isNull } from 'drizzle-orm';
import {
  ID_PREFIXES,
  NotFoundError,
  addPrefix,
  stripPrefix,
  type ListQuery,
  type ListResponse,
  type Run,
} from '@threadline/sdk';
import type { DbClient } from '../../client.js';
import { events, runSteps, runs } from '../../schema/index.js';
import type { RunFilter, RunRepository } from '../types.js';
import { existsQuietly } from '../exists.js';
import { cursorOrder, cursorWhere, guard, toPage } from './shared.js';

type RunRow = typeof runs.$inferSelect;

function toRun(row: RunRow): Run {
  return {
    ...row,
    id: addPrefix(ID_PREFIXES.run, row.id),
    threadId: addPrefix(ID_PREFIXES.thread, row.threadId),
    assistantId: addPrefix(ID_PREFIXES.assistant, row.assistantId),
  };
}

function toRow(run: Run): RunRow {
  return {
    ...run,
    id: stripPrefix(run.id),
    threadId: stripPrefix(run.threadId),
    assistantId: stripPrefix(run.assistantId),
  };
}

export class RelationalRunRepository implements RunRepository {
  constructor(private readonly db: DbClient) {}

  async create(run: Run): Promise<Run> {
    guard('create run', () => this.db.insert(runs).values(toRow(run)).run());
    return run;
  }

  async findOne(id: string, filters?: RunFilter): Promise<Run> {
    const conditions = [eq(runs.id, stripPrefix(id))];
    if (filters?.threadId) conditions.push(eq(runs.threadId, stripPrefix(filters.threadId)));
    const row = guard('read run', () => this.db.select().from(runs).where(and(...conditions)).get());
    if (!row) throw NotFoundError.forResource('Run', id);
    return toRun(row);
  }

  async update(run: Run): Promise<Run> {
    const { id, ...values } = toRow(run);
    const result = guard('update run', () =>
      this.db.update(runs).set(values).where(eq(runs.id, id)).run()
    );
    if (result.changes === 0) throw NotFoundError.forResource('Run', run.id);
    return run;
  }

  async requestCancel(id: string, at: Date): Promise<Run> {
    guard('cancel run', () =>
      this.db
        .update(runs)
        .set({ triedCancellingAt: at })
        .where(
          and(
            eq(runs.id, stripPrefix(id)),
            isNull(runs.triedCancellingAt),
            isNull(runs.completedAt),
            isNull(runs.failedAt),
            isNull(runs.cancelledAt),
            gt(runs.expiresAt, at)
          )
        )
        .run()
    );
    return this.findOne(id);
  }

  async delete(id: string, filters?: RunFilter): Promise<void> {
    const run = await this.findOne(id, filters);
    const rawId = stripPrefix(run.id);
    guard('delete run', () =>
      this.db.transaction((tx) => {
        tx.delete(runSteps).where(eq(runSteps.runId, rawId)).run();
        tx.delete(events).where(eq(events.runId, rawId)).run();
        tx.delete(runs).where(eq(runs.id, rawId)).run();
      })
    );
  }

  async find(query: ListQuery, filters?: RunFilter): Promise<ListResponse<Run>> {
    const conditions = cursorWhere(runs.id, query);
    if (filters?.threadId) conditions.push(eq(runs.threadId, stripPrefix(filters.threadId)));
    const rows = guard('list runs', () =>
      this.db
        .select()
        .from(runs)
        .where(and(...conditions))
        .orderBy(cursorOrder(runs.id, query))
        .limit(query.limit + 1)
        .all()
    );
    return toPage(rows.map(toRun), query, (run) => run.id);
  }

  async exists(id: string, filters?: RunFilter): Promise<boolean> {
    return existsQuietly(() => this.findOne(id, filters));
  }
}
