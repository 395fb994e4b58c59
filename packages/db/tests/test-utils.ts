/**
 * Test utilities for storage tests
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { vi } from 'vitest';
import {
  ID_PREFIXES,
  ROOT_MESSAGE_PARENT_ID,
  generateId,
  type Logger,
  type Message,
  type Run,
  type RunStep,
  type Thread,
} from '@threadline/sdk';
import { openDb, type DbHandle } from '../src/client.js';
import { MigrationRunner, REVISIONS } from '../src/migrations/index.js';
import { createRepositories, type Repositories } from '../src/repositories/index.js';

export const FIXED_TIME = new Date('2024-01-01T00:00:00Z');

/**
 * Create a mock logger for testing
 */
export function createMockLogger(): Logger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

export function createTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'threadline-db-'));
}

export function removeDir(dir: string): Promise<void> {
  return rm(dir, { recursive: true, force: true });
}

/**
 * In-memory sqlite database migrated to the latest revision
 */
export async function createTestDb(dataDir: string): Promise<DbHandle> {
  const handle = openDb(':memory:');
  const runner = new MigrationRunner(
    { db: handle.db, sqlite: handle.sqlite, dataDir, logger: createMockLogger() },
    REVISIONS
  );
  await runner.migrate();
  return handle;
}

export interface TestBackend {
  repos: Repositories;
  cleanup(): Promise<void>;
}

export const BACKENDS: Array<[string, () => Promise<TestBackend>]> = [
  [
    'sqlite',
    async () => {
      const dataDir = await createTempDir();
      const handle = await createTestDb(dataDir);
      return {
        repos: createRepositories({ backend: 'sqlite', db: handle.db }),
        cleanup: async () => {
          handle.close();
          await removeDir(dataDir);
        },
      };
    },
  ],
  [
    'file',
    async () => {
      const dataDir = await createTempDir();
      return {
        repos: createRepositories({ backend: 'file', dataDir }),
        cleanup: () => removeDir(dataDir),
      };
    },
  ],
];

export function makeThread(overrides?: Partial<Thread>): Thread {
  return {
    id: generateId(ID_PREFIXES.thread),
    workspaceId: null,
    createdAt: FIXED_TIME,
    name: null,
    ...overrides,
  };
}

export function makeMessage(threadId: string, overrides?: Partial<Message>): Message {
  return {
    id: generateId(ID_PREFIXES.message),
    threadId,
    parentId: ROOT_MESSAGE_PARENT_ID,
    createdAt: FIXED_TIME,
    role: 'user',
    content: [{ type: 'text', text: 'hello' }],
    assistantId: null,
    runId: null,
    ...overrides,
  };
}

export function makeRun(threadId: string, overrides?: Partial<Run>): Run {
  return {
    id: generateId(ID_PREFIXES.run),
    threadId,
    assistantId: generateId(ID_PREFIXES.assistant),
    model: 'echo',
    instructions: null,
    createdAt: FIXED_TIME,
    startedAt: null,
    completedAt: null,
    failedAt: null,
    cancelledAt: null,
    triedCancellingAt: null,
    expiresAt: new Date('2024-01-01T00:10:00Z'),
    lastError: null,
    ...overrides,
  };
}

export function makeRunStep(run: Run, overrides?: Partial<RunStep>): RunStep {
  return {
    id: generateId(ID_PREFIXES.runStep),
    runId: run.id,
    threadId: run.threadId,
    assistantId: run.assistantId,
    type: 'tool_calls',
    stepDetails: {
      type: 'tool_calls',
      tool_calls: [
        { id: 'call_1', type: 'function', function: { name: 'system.ping', arguments: '{}', output: null } },
      ],
    },
    createdAt: FIXED_TIME,
    completedAt: null,
    failedAt: null,
    cancelledAt: null,
    expiredAt: null,
    lastError: null,
    ...overrides,
  };
}
