import { Readable } from 'node:stream';
import type { FastifyReply } from 'fastify';
import { toEventLine, type EventRecord } from '@threadline/sdk';

export const NDJSON_CONTENT_TYPE = 'application/x-ndjson';

async function* toLines(records: AsyncIterable<EventRecord>): AsyncGenerator<string> {
  for await (const record of records) {
    yield toEventLine(record);
  }
}

/**
 * Streams events as `{"event":…,"data":…}` lines until the source ends.
 * The source is aborted when the client goes away.
 */
export function sendEventStream(
  reply: FastifyReply,
  open: (signal: AbortSignal) => AsyncIterable<EventRecord>
): FastifyReply {
  const controller = new AbortController();
  reply.raw.on('close', () => controller.abort());

  return reply
    .status(200)
    .header('content-type', NDJSON_CONTENT_TYPE)
    .header('cache-control', 'no-cache')
    .send(Readable.from(toLines(open(controller.signal))));
}
