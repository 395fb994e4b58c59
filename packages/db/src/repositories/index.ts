import type { DbClient } from '../client.js';
import { createFileRepositories } from './file/index.js';
import { createRelationalRepositories } from './relational/index.js';
import type { Repositories } from './types.js';

export type StorageBackend = 'sqlite' | 'file';

export type RepositoryOptions =
  | { backend: 'sqlite'; db: DbClient }
  | { backend: 'file'; dataDir: string };

/** Picks the backend at startup; callers only see the interfaces. */
export function createRepositories(options: RepositoryOptions): Repositories {
  switch (options.backend) {
    case 'sqlite':
      return createRelationalRepositories(options.db);
    case 'file':
      return createFileRepositories(options.dataDir);
  }
}

export * from './types.js';
export * from './relational/index.js';
export * from './file/index.js';
export { existsQuietly } from './exists.js';
