import { max } from 'drizzle-orm';
import { InvalidArgumentError, InvalidStateError, StorageError, errorMessage } from '@threadline/sdk';
import { migrationVersion } from '../schema/index.js';
import { tableExists } from './shared.js';
import type { MigrationContext, Revision } from './types.js';

const VERSION_TABLE = `
CREATE TABLE IF NOT EXISTS migration_version (
    version INTEGER PRIMARY KEY,
    applied_at INTEGER NOT NULL
);
`;

/**
 * Orders revisions by their `previous` links. The chain must have a single
 * head and no forks, gaps or cycles.
 */
export function resolveChain(revisions: Revision[]): Revision[] {
  const byVersion = new Map<number, Revision>();
  for (const revision of revisions) {
    if (byVersion.has(revision.version)) {
      throw new InvalidStateError(`Duplicate migration version ${revision.version}`);
    }
    byVersion.set(revision.version, revision);
  }

  const heads = revisions.filter((revision) => revision.previous === null);
  if (revisions.length > 0 && heads.length !== 1) {
    throw new InvalidStateError(`Migration chain must have exactly one head, found ${heads.length}`);
  }

  const next = new Map<number, Revision>();
  for (const revision of revisions) {
    if (revision.previous === null) continue;
    if (!byVersion.has(revision.previous)) {
      throw new InvalidStateError(
        `Migration ${revision.version} follows unknown revision ${revision.previous}`
      );
    }
    if (next.has(revision.previous)) {
      throw new InvalidStateError(`Migration chain forks after revision ${revision.previous}`);
    }
    next.set(revision.previous, revision);
  }

  const chain: Revision[] = [];
  let current: Revision | undefined = heads[0];
  while (current) {
    chain.push(current);
    current = next.get(current.version);
  }
  if (chain.length !== revisions.length) {
    throw new InvalidStateError('Migration chain has revisions unreachable from its head');
  }
  return chain;
}

export class MigrationRunner {
  private readonly chain: Revision[];

  constructor(
    private readonly ctx: MigrationContext,
    revisions: Revision[]
  ) {
    this.chain = resolveChain(revisions);
  }

  /** Highest applied version; 0 for a store that predates versioning. */
  currentVersion(): number {
    if (!tableExists(this.ctx.sqlite, 'migration_version')) return 0;
    const row = this.ctx.db.select({ version: max(migrationVersion.version) }).from(migrationVersion).get();
    return row?.version ?? 0;
  }

  latestVersion(): number {
    return this.chain[this.chain.length - 1]?.version ?? 0;
  }

  /**
   * Re-checks the registered chain and that the applied version belongs to
   * it. Returns the versions in upgrade order.
   */
  validateChain(): number[] {
    const chain = resolveChain(this.chain);
    this.indexOfCurrent();
    return chain.map((revision) => revision.version);
  }

  shouldMigrate(): boolean {
    return this.indexOfCurrent() < this.chain.length - 1;
  }

  /** Applies pending revisions in chain order and returns their versions. */
  async migrate(): Promise<number[]> {
    const pending = this.chain.slice(this.indexOfCurrent() + 1);
    if (pending.length === 0) return [];

    this.ctx.sqlite.exec(VERSION_TABLE);
    const applied: number[] = [];
    for (const revision of pending) {
      this.ctx.logger.info({ version: revision.version, name: revision.name }, 'Applying migration');
      try {
        await revision.upgrade(this.ctx);
      } catch (error) {
        this.ctx.logger.error(
          { version: revision.version, name: revision.name, error: errorMessage(error) },
          'Migration failed'
        );
        throw new StorageError(
          `Migration ${revision.version} (${revision.name}) failed: ${errorMessage(error)}`,
          { cause: error }
        );
      }
      this.ctx.db.insert(migrationVersion).values({ version: revision.version, appliedAt: new Date() }).run();
      applied.push(revision.version);
    }
    this.ctx.logger.info({ version: this.currentVersion() }, 'Migrations complete');
    return applied;
  }

  /** Reverts applied revisions newer than `targetVersion`, newest first. */
  async downgrade(targetVersion: number): Promise<number[]> {
    if (!Number.isInteger(targetVersion) || targetVersion < 1) {
      throw new InvalidArgumentError(`Downgrade target must be a version of at least 1, got ${targetVersion}`);
    }
    const currentIndex = this.indexOfCurrent();
    const reverted: number[] = [];
    for (let index = currentIndex; index >= 0; index--) {
      const revision = this.chain[index];
      if (!revision || revision.version <= targetVersion) break;
      this.ctx.logger.info({ version: revision.version, name: revision.name }, 'Reverting migration');
      await revision.downgrade(this.ctx);
      this.ctx.sqlite.prepare('DELETE FROM migration_version WHERE version >= ?').run(revision.version);
      reverted.push(revision.version);
    }
    return reverted;
  }

  private indexOfCurrent(): number {
    const current = this.currentVersion();
    if (current === 0) return -1;
    const index = this.chain.findIndex((revision) => revision.version === current);
    if (index === -1) {
      throw new InvalidStateError(`Applied migration version ${current} is not part of the chain`);
    }
    return index;
  }
}
