import pino from 'pino';
import type { Logger } from 'pino';
import {
  BlobStore,
  MigrationRunner,
  REVISIONS,
  createRepositories,
  openDb,
  type DbHandle,
  type Repositories,
} from '@threadline/db';
import {
  AgentRegistry,
  EchoAgent,
  EventLog,
  EventPublisher,
  MessageTreeStore,
  NdjsonSink,
  RunRunner,
  RunScheduler,
  type EventSink,
} from '@threadline/core';
import type { AppConfig } from './config.js';

/** Everything a request handler or the lifecycle needs, built once per process. */
export interface AppContext {
  config: AppConfig;
  logger: Logger;
  db: DbHandle | null;
  repos: Repositories;
  blobs: BlobStore;
  publisher: EventPublisher;
  events: EventLog;
  tree: MessageTreeStore;
  agents: AgentRegistry;
  runner: RunRunner;
  scheduler: RunScheduler;
  /** Brings the relational schema to the latest revision; returns the applied versions. */
  migrate(): Promise<number[]>;
  close(): void;
}

/** Options every resource plugin is registered with. */
export interface RouteOptions {
  ctx: AppContext;
}

export interface AppContextOptions {
  logger?: Logger;
  agents?: AgentRegistry;
}

export function createAppContext(config: AppConfig, options: AppContextOptions = {}): AppContext {
  const logger = options.logger ?? pino({ level: config.logLevel });
  const db = config.storageBackend === 'sqlite' ? openDb(config.databaseUrl) : null;
  const repos = db
    ? createRepositories({ backend: 'sqlite', db: db.db })
    : createRepositories({ backend: 'file', dataDir: config.dataDir });

  const sinks: EventSink[] = config.eventSink === 'stdout' ? [new NdjsonSink(process.stdout)] : [];
  const publisher = new EventPublisher(logger.child({ component: 'events' }), sinks);
  const events = new EventLog(repos.events, publisher);
  const tree = new MessageTreeStore(repos.messages, { maxCachedThreads: config.threadCacheSize });
  const agents = options.agents ?? new AgentRegistry(new EchoAgent());
  const runner = new RunRunner({
    runs: repos.runs,
    runSteps: repos.runSteps,
    assistants: repos.assistants,
    tree,
    events,
    agents,
    logger: logger.child({ component: 'runner' }),
  });
  const scheduler = new RunScheduler(runner, logger.child({ component: 'scheduler' }), {
    sweepIntervalMs: config.runSweepIntervalMs,
  });

  return {
    config,
    logger,
    db,
    repos,
    blobs: new BlobStore(config.dataDir),
    publisher,
    events,
    tree,
    agents,
    runner,
    scheduler,
    migrate: async () => {
      if (!db) {
        logger.info({ backend: config.storageBackend }, 'Skipping migrations for file storage');
        return [];
      }
      const migrations = new MigrationRunner(
        {
          db: db.db,
          sqlite: db.sqlite,
          dataDir: config.dataDir,
          logger: logger.child({ component: 'migrations' }),
          timeZone: config.timeZone,
        },
        REVISIONS
      );
      if (!migrations.shouldMigrate()) return [];
      return migrations.migrate();
    },
    close: () => {
      scheduler.stop();
      db?.close();
    },
  };
}
