import { and, asc, desc, eq, gt } from 'drizzle-orm';
import { ID_PREFIXES, addPrefix, stripPrefix, type EventRecord } from '@threadline/sdk';
import type { DbClient } from '../../client.js';
import { events } from '../../schema/index.js';
import type { EventRepository } from '../types.js';
import { guard } from './shared.js';

type EventRow = typeof events.$inferSelect;

function toRecord(row: EventRow): EventRecord {
  return {
    runId: addPrefix(ID_PREFIXES.run, row.runId),
    threadId: addPrefix(ID_PREFIXES.thread, row.threadId),
    sequenceNum: row.sequenceNum,
    eventType: row.eventType,
    eventData: row.eventData,
    createdAt: row.createdAt,
  };
}

export class RelationalEventRepository implements EventRepository {
  constructor(private readonly db: DbClient) {}

  async append(record: EventRecord): Promise<EventRecord> {
    guard('append event', () =>
      this.db
        .insert(events)
        .values({
          runId: stripPrefix(record.runId),
          threadId: stripPrefix(record.threadId),
          sequenceNum: record.sequenceNum,
          eventType: record.eventType,
          eventData: record.eventData,
          createdAt: record.createdAt,
        })
        .run()
    );
    return record;
  }

  async list(
    runId: string,
    options: { afterSequence: number; limit: number }
  ): Promise<EventRecord[]> {
    const rows = guard('list events', () =>
      this.db
        .select()
        .from(events)
        .where(and(eq(events.runId, stripPrefix(runId)), gt(events.sequenceNum, options.afterSequence)))
        .orderBy(asc(events.sequenceNum))
        .limit(options.limit)
        .all()
    );
    return rows.map(toRecord);
  }

  async last(runId: string): Promise<EventRecord | undefined> {
    const row = guard('read last event', () =>
      this.db
        .select()
        .from(events)
        .where(eq(events.runId, stripPrefix(runId)))
        .orderBy(desc(events.sequenceNum))
        .limit(1)
        .get()
    );
    return row ? toRecord(row) : undefined;
  }
}
