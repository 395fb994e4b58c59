import { integer, sqliteTable } from 'drizzle-orm/sqlite-core';

/** Append log of applied revisions; the current version is the maximum. */
export const migrationVersion = sqliteTable('migration_version', {
  version: integer('version').primaryKey(),
  appliedAt: integer('applied_at', { mode: 'timestamp' }).notNull(),
});
