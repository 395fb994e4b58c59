import { EventEmitter } from 'node:events';
import type { Writable } from 'node:stream';
import { errorMessage, toEventLine, type EventRecord, type Logger } from '@threadline/sdk';

export type EventListener = (record: EventRecord) => void;

/** Receives every published record, whatever the run. */
export interface EventSink {
  write(record: EventRecord): void | Promise<void>;
}

/** Appends `{"event":…,"data":…}` lines to a stream such as stdout. */
export class NdjsonSink implements EventSink {
  constructor(private readonly stream: Writable) {}

  write(record: EventRecord): void {
    this.stream.write(toEventLine(record));
  }
}

/**
 * Live fan-out of appended events. Delivery is best effort: a failing
 * listener or sink is logged and never reaches the appender.
 */
export class EventPublisher {
  private readonly emitter = new EventEmitter();

  constructor(
    private readonly logger: Logger,
    private readonly sinks: EventSink[] = []
  ) {
    this.emitter.setMaxListeners(0);
  }

  subscribe(runId: string, listener: EventListener): () => void {
    const guarded = (record: EventRecord) => {
      try {
        listener(record);
      } catch (error) {
        this.logger.warn({ runId, error: errorMessage(error) }, 'Event listener failed');
      }
    };
    this.emitter.on(runId, guarded);
    return () => {
      this.emitter.off(runId, guarded);
    };
  }

  listenerCount(runId: string): number {
    return this.emitter.listenerCount(runId);
  }

  publish(record: EventRecord): void {
    this.emitter.emit(record.runId, record);
    for (const sink of this.sinks) {
      try {
        Promise.resolve(sink.write(record)).catch((error: unknown) => this.sinkFailed(record, error));
      } catch (error) {
        this.sinkFailed(record, error);
      }
    }
  }

  private sinkFailed(record: EventRecord, error: unknown): void {
    this.logger.warn(
      { runId: record.runId, sequenceNum: record.sequenceNum, error: errorMessage(error) },
      'Event sink failed'
    );
  }
}
