/**
 * Unit tests for behaviour specific to the file backend
 */

import { appendFile, readdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { StorageError, getRunStatus } from '@threadline/sdk';
import { createRepositories, type Repositories } from '../../src/repositories/index.js';
import { FIXED_TIME, createTempDir, makeRun, makeThread, removeDir } from '../test-utils.js';

describe('file backend [unit]', () => {
  let dataDir: string;
  let repos: Repositories;

  beforeEach(async () => {
    dataDir = await createTempDir();
    repos = createRepositories({ backend: 'file', dataDir });
  });

  afterEach(async () => {
    await removeDir(dataDir);
  });

  it('should report a torn event line as a storage error', async () => {
    const thread = makeThread();
    const run = makeRun(thread.id);
    await repos.threads.create(thread);
    await repos.runs.create(run);
    await repos.events.append({
      runId: run.id,
      threadId: thread.id,
      sequenceNum: 1,
      eventType: 'thread.run.in_progress',
      eventData: { id: run.id },
      createdAt: FIXED_TIME,
    });
    await appendFile(join(dataDir, 'threads', thread.id, 'events', `${run.id}.jsonl`), '{"runId":"run_');

    await expect(repos.events.list(run.id, { afterSequence: 0, limit: 10 })).rejects.toThrow(
      `Corrupt event at line 2 for run ${run.id}`
    );
    await expect(repos.events.last(run.id)).rejects.toThrow(StorageError);
  });

  it('should report a corrupt record as absent from exists', async () => {
    const thread = makeThread();
    await repos.threads.create(thread);
    await writeFile(join(dataDir, 'threads', `${thread.id}.json`), '{"id":');

    await expect(repos.threads.findOne(thread.id)).rejects.toThrow(StorageError);
    expect(await repos.threads.exists(thread.id)).toBe(false);
  });

  it('should not let a stale update and a cancel request interleave', async () => {
    const thread = makeThread();
    const run = makeRun(thread.id, { startedAt: new Date('2024-01-01T00:00:05Z') });
    await repos.threads.create(thread);
    await repos.runs.create(run);
    const at = new Date('2024-01-01T00:00:07Z');

    const [, cancelling] = await Promise.all([
      repos.runs.update({ ...run, completedAt: new Date('2024-01-01T00:00:06Z') }),
      repos.runs.requestCancel(run.id, at),
    ]);

    expect(getRunStatus(cancelling, at)).toBe('completed');
    expect(cancelling.triedCancellingAt).toBeNull();
  });

  it('should never create directories outside the data dir', async () => {
    await expect(repos.runs.create(makeRun('../../escaped'))).rejects.toThrow();

    expect(await readdir(dataDir)).toEqual([]);
  });
});
