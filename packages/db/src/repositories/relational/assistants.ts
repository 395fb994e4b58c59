import { and, eq } from 'drizzle-orm';
import {
  ID_PREFIXES,
  NotFoundError,
  addPrefix,
  stripPrefix,
  type Assistant,
  type ListQuery,
  type ListResponse,
} from '@threadline/sdk';
import type { DbClient } from '../../client.js';
import { assistants } from '../../schema/index.js';
import type { AssistantRepository, WorkspaceFilter } from '../types.js';
import { existsQuietly } from '../exists.js';
import { cursorOrder, cursorWhere, guard, toPage, workspaceVisible } from './shared.js';

function toAssistant(row: typeof assistants.$inferSelect): Assistant {
  return { ...row, id: addPrefix(ID_PREFIXES.assistant, row.id) };
}

export class RelationalAssistantRepository implements AssistantRepository {
  constructor(private readonly db: DbClient) {}

  async create(assistant: Assistant): Promise<Assistant> {
    guard('create assistant', () =>
      this.db
        .insert(assistants)
        .values({ ...assistant, id: stripPrefix(assistant.id) })
        .run()
    );
    return assistant;
  }

  async findOne(id: string, filters?: WorkspaceFilter): Promise<Assistant> {
    const row = guard('read assistant', () =>
      this.db
        .select()
        .from(assistants)
        .where(
          and(
            eq(assistants.id, stripPrefix(id)),
            workspaceVisible(assistants.workspaceId, filters?.workspaceId)
          )
        )
        .get()
    );
    if (!row) throw NotFoundError.forResource('Assistant', id);
    return toAssistant(row);
  }

  async update(assistant: Assistant): Promise<Assistant> {
    const { id, ...values } = assistant;
    const result = guard('update assistant', () =>
      this.db.update(assistants).set(values).where(eq(assistants.id, stripPrefix(id))).run()
    );
    if (result.changes === 0) throw NotFoundError.forResource('Assistant', id);
    return assistant;
  }

  async delete(id: string, filters?: WorkspaceFilter): Promise<void> {
    await this.findOne(id, filters);
    guard('delete assistant', () =>
      this.db.delete(assistants).where(eq(assistants.id, stripPrefix(id))).run()
    );
  }

  async find(query: ListQuery, filters?: WorkspaceFilter): Promise<ListResponse<Assistant>> {
    const rows = guard('list assistants', () =>
      this.db
        .select()
        .from(assistants)
        .where(
          and(
            ...cursorWhere(assistants.id, query),
            workspaceVisible(assistants.workspaceId, filters?.workspaceId)
          )
        )
        .orderBy(cursorOrder(assistants.id, query))
        .limit(query.limit + 1)
        .all()
    );
    return toPage(rows.map(toAssistant), query, (assistant) => assistant.id);
  }

  async exists(id: string, filters?: WorkspaceFilter): Promise<boolean> {
    return existsQuietly(() => this.findOne(id, filters));
  }
}
