import { and, eq } from 'drizzle-orm';
import {
  ID_PREFIXES,
  NotFoundError,
  addPrefix,
  stripPrefix,
  type ListQuery,
  type ListResponse,
  type Thread,
} from '@threadline/sdk';
import type { DbClient } from '../../client.js';
import { events, executions, messages, runSteps, runs, threads } from '../../schema/index.js';
import type { ThreadRepository, WorkspaceFilter } from '../types.js';
import { existsQuietly } from '../exists.js';
import { cursorOrder, cursorWhere, guard, toPage, workspaceVisible } from './shared.js';

type ThreadRow = typeof threads.$inferSelect;

function toThread(row: ThreadRow): Thread {
  return { ...row, id: addPrefix(ID_PREFIXES.thread, row.id) };
}

export class RelationalThreadRepository implements ThreadRepository {
  constructor(private readonly db: DbClient) {}

  async create(thread: Thread): Promise<Thread> {
    guard('create thread', () =>
      this.db
        .insert(threads)
        .values({ ...thread, id: stripPrefix(thread.id) })
        .run()
    );
    return thread;
  }

  async findOne(id: string, filters?: WorkspaceFilter): Promise<Thread> {
    const row = guard('read thread', () =>
      this.db
        .select()
        .from(threads)
        .where(and(eq(threads.id, stripPrefix(id)), workspaceVisible(threads.workspaceId, filters?.workspaceId)))
        .get()
    );
    if (!row) throw NotFoundError.forResource('Thread', id);
    return toThread(row);
  }

  async update(thread: Thread): Promise<Thread> {
    const result = guard('update thread', () =>
      this.db
        .update(threads)
        .set({ workspaceId: thread.workspaceId, createdAt: thread.createdAt, name: thread.name })
        .where(eq(threads.id, stripPrefix(thread.id)))
        .run()
    );
    if (result.changes === 0) throw NotFoundError.forResource('Thread', thread.id);
    return thread;
  }

  async delete(id: string, filters?: WorkspaceFilter): Promise<void> {
    const rawId = stripPrefix(id);
    await this.findOne(id, filters);
    guard('delete thread', () =>
      this.db.transaction((tx) => {
        tx.delete(executions).where(eq(executions.threadId, rawId)).run();
        tx.delete(runSteps).where(eq(runSteps.threadId, rawId)).run();
        tx.delete(events).where(eq(events.threadId, rawId)).run();
        tx.delete(runs).where(eq(runs.threadId, rawId)).run();
        tx.delete(messages).where(eq(messages.threadId, rawId)).run();
        tx.delete(threads).where(eq(threads.id, rawId)).run();
      })
    );
  }

  async find(query: ListQuery, filters?: WorkspaceFilter): Promise<ListResponse<Thread>> {
    const rows = guard('list threads', () =>
      this.db
        .select()
        .from(threads)
        .where(and(...cursorWhere(threads.id, query), workspaceVisible(threads.workspaceId, filters?.workspaceId)))
        .orderBy(cursorOrder(threads.id, query))
        .limit(query.limit + 1)
        .all()
    );
    return toPage(rows.map(toThread), query, (thread) => thread.id);
  }

  async exists(id: string, filters?: WorkspaceFilter): Promise<boolean> {
    return existsQuietly(() => this.findOne(id, filters));
  }
}
