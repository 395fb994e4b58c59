import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { config } from 'dotenv';
import pino from 'pino';
import { errorMessage } from '@threadline/sdk';
import { openDb } from './client.js';
import { MigrationRunner, REVISIONS } from './migrations/index.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
config({ path: resolve(__dirname, '../../../.env') });

const logger = pino({ level: process.env.LOG_LEVEL ?? 'info' });

const usage = 'Usage: migrate up | migrate down <version>';

const runMigrations = async (argv: string[]) => {
  const [command = 'up', target] = argv;
  const dataDir = process.env.DATA_DIR ?? './data';
  const handle = openDb(process.env.DATABASE_URL ?? join(dataDir, 'database.sqlite'));
  const runner = new MigrationRunner(
    { db: handle.db, sqlite: handle.sqlite, dataDir, logger, timeZone: process.env.TIME_ZONE ?? 'UTC' },
    REVISIONS
  );

  try {
    if (command === 'up') {
      const applied = await runner.migrate();
      logger.info({ applied, version: runner.currentVersion() }, 'Schema is up to date');
    } else if (command === 'down' && target !== undefined) {
      const reverted = await runner.downgrade(Number(target));
      logger.info({ reverted, version: runner.currentVersion() }, 'Downgrade complete');
    } else {
      throw new Error(usage);
    }
  } finally {
    handle.close();
  }
};

runMigrations(process.argv.slice(2)).catch((err: unknown) => {
  logger.error({ error: errorMessage(err) }, 'Migration failed');
  process.exit(1);
});
