import { and, asc, eq, inArray } from 'drizzle-orm';
import {
  ID_PREFIXES,
  NotFoundError,
  addPrefix,
  stripPrefix,
  type ListQuery,
  type ListResponse,
  type Message,
} from '@threadline/sdk';
import type { DbClient } from '../../client.js';
import { messages } from '../../schema/index.js';
import type { MessageRepository, ThreadScope } from '../types.js';
import { existsQuietly } from '../exists.js';
import { cursorOrder, cursorWhere, guard, toPage } from './shared.js';

type MessageRow = typeof messages.$inferSelect;

function toMessage(row: MessageRow): Message {
  return {
    ...row,
    id: addPrefix(ID_PREFIXES.message, row.id),
    threadId: addPrefix(ID_PREFIXES.thread, row.threadId),
    parentId: addPrefix(ID_PREFIXES.message, row.parentId),
    assistantId: row.assistantId === null ? null : addPrefix(ID_PREFIXES.assistant, row.assistantId),
    runId: row.runId === null ? null : addPrefix(ID_PREFIXES.run, row.runId),
  };
}

function toRow(message: Message): MessageRow {
  return {
    ...message,
    id: stripPrefix(message.id),
    threadId: stripPrefix(message.threadId),
    parentId: stripPrefix(message.parentId),
    assistantId: message.assistantId === null ? null : stripPrefix(message.assistantId),
    runId: message.runId === null ? null : stripPrefix(message.runId),
  };
}

export class RelationalMessageRepository implements MessageRepository {
  constructor(private readonly db: DbClient) {}

  async create(message: Message): Promise<Message> {
    guard('create message', () => this.db.insert(messages).values(toRow(message)).run());
    return message;
  }

  async findOne(id: string, scope?: ThreadScope): Promise<Message> {
    const conditions = [eq(messages.id, stripPrefix(id))];
    if (scope) conditions.push(eq(messages.threadId, stripPrefix(scope.threadId)));
    const row = guard('read message', () =>
      this.db.select().from(messages).where(and(...conditions)).get()
    );
    if (!row) throw NotFoundError.forResource('Message', id);
    return toMessage(row);
  }

  async update(message: Message): Promise<Message> {
    const { id, ...values } = toRow(message);
    const result = guard('update message', () =>
      this.db.update(messages).set(values).where(eq(messages.id, id)).run()
    );
    if (result.changes === 0) throw NotFoundError.forResource('Message', message.id);
    return message;
  }

  async delete(id: string, scope?: ThreadScope): Promise<void> {
    const message = await this.findOne(id, scope);
    guard('delete message', () =>
      this.db.delete(messages).where(eq(messages.id, stripPrefix(message.id))).run()
    );
  }

  async deleteMany(threadId: string, ids: string[]): Promise<void> {
    if (ids.length === 0) return;
    guard('delete messages', () =>
      this.db
        .delete(messages)
        .where(
          and(
            eq(messages.threadId, stripPrefix(threadId)),
            inArray(
              messages.id,
              ids.map((id) => stripPrefix(id))
            )
          )
        )
        .run()
    );
  }

  async find(query: ListQuery, scope?: ThreadScope): Promise<ListResponse<Message>> {
    const conditions = cursorWhere(messages.id, query);
    if (scope) conditions.push(eq(messages.threadId, stripPrefix(scope.threadId)));
    const rows = guard('list messages', () =>
      this.db
        .select()
        .from(messages)
        .where(and(...conditions))
        .orderBy(cursorOrder(messages.id, query))
        .limit(query.limit + 1)
        .all()
    );
    return toPage(rows.map(toMessage), query, (message) => message.id);
  }

  async findByThread(threadId: string): Promise<Message[]> {
    const rows = guard('list thread messages', () =>
      this.db
        .select()
        .from(messages)
        .where(eq(messages.threadId, stripPrefix(threadId)))
        .orderBy(asc(messages.id))
        .all()
    );
    return rows.map(toMessage);
  }

  async exists(id: string, scope?: ThreadScope): Promise<boolean> {
    return existsQuietly(() => this.findOne(id, scope));
  }
}
