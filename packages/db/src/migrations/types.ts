import type Database from 'better-sqlite3';
import type { Logger } from '@threadline/sdk';
import type { DbClient } from '../client.js';

export interface MigrationContext {
  db: DbClient;
  sqlite: Database.Database;
  dataDir: string;
  logger: Logger;
  /** Zone of datetimes stored without an offset; defaults to UTC. */
  timeZone?: string;
}

/**
 * One step of the schema chain. `previous` names the revision this one builds
 * on (null for the first). Upgrades must be safe to run again.
 */
export interface Revision {
  version: number;
  previous: number | null;
  name: string;
  upgrade(ctx: MigrationContext): void | Promise<void>;
  downgrade(ctx: MigrationContext): void | Promise<void>;
}
