/**
 * Unit tests for the repository contract, run against both backends
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  ConflictError,
  ID_PREFIXES,
  NotFoundError,
  generateId,
  parseListQuery,
  type EventRecord,
  type Workflow,
} from '@threadline/sdk';
import type { Repositories } from '../../src/repositories/index.js';
import {
  BACKENDS,
  FIXED_TIME,
  makeMessage,
  makeRun,
  makeRunStep,
  makeThread,
  type TestBackend,
} from '../test-utils.js';

function makeEvent(runId: string, threadId: string, sequenceNum: number): EventRecord {
  return {
    runId,
    threadId,
    sequenceNum,
    eventType: 'thread.run.in_progress',
    eventData: { id: runId, step: sequenceNum },
    createdAt: FIXED_TIME,
  };
}

function makeWorkflow(tags: string[], workspaceId: string | null = null): Workflow {
  return {
    id: generateId(ID_PREFIXES.workflow),
    workspaceId,
    createdAt: FIXED_TIME,
    name: 'triage',
    description: 'Sorts incoming requests',
    tags,
    assistantId: generateId(ID_PREFIXES.assistant),
  };
}

describe.each(BACKENDS)('repositories [unit] (%s)', (_name, createBackend) => {
  let backend: TestBackend;
  let repos: Repositories;

  beforeEach(async () => {
    backend = await createBackend();
    repos = backend.repos;
  });

  afterEach(async () => {
    await backend.cleanup();
  });

  describe('threads', () => {
    it('should round trip a thread', async () => {
      const thread = makeThread({ name: 'planning', workspaceId: 'ws-a' });
      await repos.threads.create(thread);

      expect(await repos.threads.findOne(thread.id)).toEqual(thread);
    });

    it('should reject a duplicate id', async () => {
      const thread = makeThread();
      await repos.threads.create(thread);

      await expect(repos.threads.create(thread)).rejects.toThrow(ConflictError);
    });

    it('should throw NotFoundError for a missing thread', async () => {
      await expect(repos.threads.findOne(generateId(ID_PREFIXES.thread))).rejects.toThrow(NotFoundError);
    });

    it('should hide threads of other workspaces', async () => {
      const owned = makeThread({ workspaceId: 'ws-a' });
      const shared = makeThread();
      await repos.threads.create(owned);
      await repos.threads.create(shared);

      await expect(repos.threads.findOne(owned.id, { workspaceId: 'ws-b' })).rejects.toThrow(NotFoundError);
      expect(await repos.threads.exists(owned.id, { workspaceId: 'ws-a' })).toBe(true);
      expect(await repos.threads.exists(shared.id, { workspaceId: 'ws-b' })).toBe(true);

      const listed = await repos.threads.find(parseListQuery({}), { workspaceId: 'ws-b' });
      expect(listed.data.map((thread) => thread.id)).toEqual([shared.id]);
    });

    it('should replace a thread on update', async () => {
      const thread = makeThread();
      await repos.threads.create(thread);
      await repos.threads.update({ ...thread, name: 'renamed' });

      expect((await repos.threads.findOne(thread.id)).name).toBe('renamed');
    });

    it('should throw NotFoundError when updating a missing thread', async () => {
      await expect(repos.threads.update(makeThread())).rejects.toThrow(NotFoundError);
    });

    it('should page threads by id', async () => {
      const threads = [makeThread(), makeThread(), makeThread()];
      for (const thread of threads) await repos.threads.create(thread);

      const first = await repos.threads.find(parseListQuery({ limit: 2, order: 'asc' }));
      expect(first.data.map((thread) => thread.id)).toEqual([threads[0]?.id, threads[1]?.id]);
      expect(first.hasMore).toBe(true);

      const second = await repos.threads.find(parseListQuery({ limit: 2, order: 'asc', after: first.lastId }));
      expect(second.data.map((thread) => thread.id)).toEqual([threads[2]?.id]);
      expect(second.hasMore).toBe(false);
    });

    it('should remove messages, runs and events with the thread', async () => {
      const thread = makeThread();
      const message = makeMessage(thread.id);
      const run = makeRun(thread.id);
      await repos.threads.create(thread);
      await repos.messages.create(message);
      await repos.runs.create(run);
      await repos.events.append(makeEvent(run.id, thread.id, 1));

      await repos.threads.delete(thread.id);

      expect(await repos.threads.exists(thread.id)).toBe(false);
      expect(await repos.messages.exists(message.id)).toBe(false);
      expect(await repos.runs.exists(run.id)).toBe(false);
      expect(await repos.events.list(run.id, { afterSequence: 0, limit: 10 })).toEqual([]);
    });

    it('should remove executions of a deleted thread', async () => {
      const thread = makeThread();
      const run = makeRun(thread.id);
      await repos.threads.create(thread);
      await repos.runs.create(run);
      const execution = {
        id: generateId(ID_PREFIXES.execution),
        workspaceId: null,
        createdAt: FIXED_TIME,
        workflowId: generateId(ID_PREFIXES.workflow),
        threadId: thread.id,
        runId: run.id,
      };
      await repos.executions.create(execution);

      await repos.threads.delete(thread.id);

      expect(await repos.executions.exists(execution.id)).toBe(false);
    });
  });

  describe('messages', () => {
    it('should list a thread in ascending id order', async () => {
      const thread = makeThread();
      await repos.threads.create(thread);
      const first = makeMessage(thread.id);
      const second = makeMessage(thread.id, { parentId: first.id, role: 'assistant' });
      await repos.messages.create(first);
      await repos.messages.create(second);

      const listed = await repos.messages.findByThread(thread.id);

      expect(listed).toEqual([first, second]);
    });

    it('should scope lookups to the thread', async () => {
      const thread = makeThread();
      const other = makeThread();
      await repos.threads.create(thread);
      await repos.threads.create(other);
      const message = makeMessage(thread.id);
      await repos.messages.create(message);

      await expect(repos.messages.findOne(message.id, { threadId: other.id })).rejects.toThrow(NotFoundError);
      expect(await repos.messages.findOne(message.id, { threadId: thread.id })).toEqual(message);
    });

    it('should delete several messages at once', async () => {
      const thread = makeThread();
      await repos.threads.create(thread);
      const messages = [makeMessage(thread.id), makeMessage(thread.id), makeMessage(thread.id)];
      for (const message of messages) await repos.messages.create(message);

      await repos.messages.deleteMany(thread.id, [messages[0]?.id ?? '', messages[2]?.id ?? '']);

      const remaining = await repos.messages.findByThread(thread.id);
      expect(remaining.map((message) => message.id)).toEqual([messages[1]?.id]);
    });
  });

  describe('runs', () => {
    it('should persist lifecycle timestamps and errors', async () => {
      const thread = makeThread();
      const run = makeRun(thread.id);
      await repos.threads.create(thread);
      await repos.runs.create(run);

      const failed = {
        ...run,
        startedAt: new Date('2024-01-01T00:00:05Z'),
        failedAt: new Date('2024-01-01T00:00:09Z'),
        lastError: { code: 'upstream_error' as const, message: 'agent unavailable' },
      };
      await repos.runs.update(failed);

      expect(await repos.runs.findOne(run.id, { threadId: thread.id })).toEqual(failed);
    });

    it('should filter runs by thread', async () => {
      const thread = makeThread();
      const other = makeThread();
      await repos.threads.create(thread);
      await repos.threads.create(other);
      const run = makeRun(thread.id);
      await repos.runs.create(run);
      await repos.runs.create(makeRun(other.id));

      const listed = await repos.runs.find(parseListQuery({}), { threadId: thread.id });

      expect(listed.data.map((item) => item.id)).toEqual([run.id]);
    });

    it('should record a cancel request on a running run', async () => {
      const thread = makeThread();
      const run = makeRun(thread.id, { startedAt: new Date('2024-01-01T00:00:05Z') });
      await repos.threads.create(thread);
      await repos.runs.create(run);

      const cancelling = await repos.runs.requestCancel(run.id, new Date('2024-01-01T00:00:07Z'));

      expect(cancelling).toEqual({ ...run, triedCancellingAt: new Date('2024-01-01T00:00:07Z') });
      expect(await repos.runs.findOne(run.id)).toEqual(cancelling);
    });

    it('should keep the first cancel request', async () => {
      const thread = makeThread();
      const run = makeRun(thread.id, { triedCancellingAt: new Date('2024-01-01T00:00:05Z') });
      await repos.threads.create(thread);
      await repos.runs.create(run);

      const stored = await repos.runs.requestCancel(run.id, new Date('2024-01-01T00:00:07Z'));

      expect(stored.triedCancellingAt).toEqual(new Date('2024-01-01T00:00:05Z'));
    });

    it('should leave a run that finished in the meantime untouched', async () => {
      const thread = makeThread();
      const run = makeRun(thread.id, { startedAt: new Date('2024-01-01T00:00:05Z') });
      await repos.threads.create(thread);
      await repos.runs.create(run);
      const completed = { ...run, completedAt: new Date('2024-01-01T00:00:06Z') };
      await repos.runs.update(completed);

      const stored = await repos.runs.requestCancel(run.id, new Date('2024-01-01T00:00:07Z'));

      expect(stored).toEqual(completed);
      expect(await repos.runs.findOne(run.id)).toEqual(completed);
    });

    it('should not record a cancel request on an expired run', async () => {
      const thread = makeThread();
      const run = makeRun(thread.id);
      await repos.threads.create(thread);
      await repos.runs.create(run);

      const stored = await repos.runs.requestCancel(run.id, new Date('2024-01-01T00:20:00Z'));

      expect(stored.triedCancellingAt).toBeNull();
    });

    it('should throw NotFoundError when cancelling a missing run', async () => {
      await expect(repos.runs.requestCancel(generateId(ID_PREFIXES.run), FIXED_TIME)).rejects.toThrow(NotFoundError);
    });
  });

  describe('run steps', () => {
    it('should list the steps of one run in id order', async () => {
      const thread = makeThread();
      const run = makeRun(thread.id);
      const other = makeRun(thread.id);
      await repos.threads.create(thread);
      await repos.runs.create(run);
      await repos.runs.create(other);
      const first = makeRunStep(run);
      const second = makeRunStep(run);
      await repos.runSteps.create(first);
      await repos.runSteps.create(second);
      await repos.runSteps.create(makeRunStep(other));

      const listed = await repos.runSteps.find(parseListQuery({ order: 'asc' }), {
        threadId: thread.id,
        runId: run.id,
      });

      expect(listed.data).toEqual([first, second]);
      expect(listed.hasMore).toBe(false);
    });

    it('should replace a step on update', async () => {
      const thread = makeThread();
      const run = makeRun(thread.id);
      await repos.threads.create(thread);
      await repos.runs.create(run);
      const step = makeRunStep(run);
      await repos.runSteps.create(step);

      const failed = {
        ...step,
        failedAt: new Date('2024-01-01T00:00:03Z'),
        lastError: { code: 'server_error' as const, message: 'tool crashed' },
      };
      await repos.runSteps.update(failed);

      expect(await repos.runSteps.findOne(step.id, { threadId: thread.id, runId: run.id })).toEqual(failed);
    });

    it('should scope lookups to the run', async () => {
      const thread = makeThread();
      const run = makeRun(thread.id);
      const other = makeRun(thread.id);
      await repos.threads.create(thread);
      await repos.runs.create(run);
      await repos.runs.create(other);
      const step = makeRunStep(run);
      await repos.runSteps.create(step);

      await expect(repos.runSteps.findOne(step.id, { threadId: thread.id, runId: other.id })).rejects.toThrow(
        NotFoundError
      );
      expect(await repos.runSteps.exists(step.id, { runId: run.id })).toBe(true);
    });

    it('should remove steps with their run', async () => {
      const thread = makeThread();
      const run = makeRun(thread.id);
      await repos.threads.create(thread);
      await repos.runs.create(run);
      const step = makeRunStep(run);
      await repos.runSteps.create(step);

      await repos.runs.delete(run.id);

      expect(await repos.runSteps.exists(step.id)).toBe(false);
    });

    it('should remove steps with their thread', async () => {
      const thread = makeThread();
      const run = makeRun(thread.id);
      await repos.threads.create(thread);
      await repos.runs.create(run);
      const step = makeRunStep(run);
      await repos.runSteps.create(step);

      await repos.threads.delete(thread.id);

      expect(await repos.runSteps.exists(step.id)).toBe(false);
    });
  });

  describe('unsafe ids', () => {
    it('should treat ids with path segments as missing', async () => {
      await expect(repos.threads.findOne('../../etc')).rejects.toThrow(NotFoundError);
      await expect(repos.runs.findOne(generateId(ID_PREFIXES.run), { threadId: '../outside' })).rejects.toThrow(
        NotFoundError
      );
      await expect(repos.assistants.findOne('asst_../../secrets')).rejects.toThrow(NotFoundError);
    });

    it('should report ids with path segments as absent', async () => {
      expect(await repos.threads.exists('../../etc')).toBe(false);
      expect(await repos.messages.exists(generateId(ID_PREFIXES.message), { threadId: '..' })).toBe(false);
    });
  });

  describe('events', () => {
    it('should list events after a sequence number', async () => {
      const thread = makeThread();
      const run = makeRun(thread.id);
      await repos.threads.create(thread);
      await repos.runs.create(run);
      for (const sequence of [1, 2, 3]) await repos.events.append(makeEvent(run.id, thread.id, sequence));

      const listed = await repos.events.list(run.id, { afterSequence: 1, limit: 10 });

      expect(listed).toEqual([makeEvent(run.id, thread.id, 2), makeEvent(run.id, thread.id, 3)]);
    });

    it('should honour the limit', async () => {
      const thread = makeThread();
      const run = makeRun(thread.id);
      await repos.threads.create(thread);
      await repos.runs.create(run);
      for (const sequence of [1, 2, 3]) await repos.events.append(makeEvent(run.id, thread.id, sequence));

      const listed = await repos.events.list(run.id, { afterSequence: 0, limit: 2 });

      expect(listed.map((record) => record.sequenceNum)).toEqual([1, 2]);
    });

    it('should return the last event or undefined', async () => {
      const thread = makeThread();
      const run = makeRun(thread.id);
      await repos.threads.create(thread);
      await repos.runs.create(run);

      expect(await repos.events.last(run.id)).toBeUndefined();

      await repos.events.append(makeEvent(run.id, thread.id, 1));
      await repos.events.append({ ...makeEvent(run.id, thread.id, 2), eventType: 'done', eventData: '[DONE]' });

      const last = await repos.events.last(run.id);
      expect(last?.sequenceNum).toBe(2);
      expect(last?.eventData).toBe('[DONE]');
    });
  });

  describe('workflows', () => {
    it('should keep tags in order', async () => {
      const workflow = makeWorkflow(['support', 'billing']);
      await repos.workflows.create(workflow);

      expect(await repos.workflows.findOne(workflow.id)).toEqual(workflow);
    });

    it('should match workflows carrying any of the requested tags', async () => {
      const support = makeWorkflow(['support']);
      const billing = makeWorkflow(['billing', 'finance']);
      const untagged = makeWorkflow([]);
      for (const workflow of [support, billing, untagged]) await repos.workflows.create(workflow);

      const listed = await repos.workflows.find(parseListQuery({ order: 'asc' }), { tags: ['finance', 'support'] });

      expect(listed.data.map((workflow) => workflow.id)).toEqual([support.id, billing.id]);
    });

    it('should replace tags on update', async () => {
      const workflow = makeWorkflow(['support']);
      await repos.workflows.create(workflow);
      await repos.workflows.update({ ...workflow, tags: ['sales'] });

      expect((await repos.workflows.findOne(workflow.id)).tags).toEqual(['sales']);
    });
  });

  describe('mcp configs', () => {
    it('should count configs visible to a workspace', async () => {
      const make = (workspaceId: string | null) => ({
        id: generateId(ID_PREFIXES.mcpConfig),
        workspaceId,
        createdAt: FIXED_TIME,
        name: 'tools',
        mcpServer: { url: 'http://localhost:9000/mcp', headers: {} },
      });
      await repos.mcpConfigs.create(make('ws-a'));
      await repos.mcpConfigs.create(make('ws-a'));
      await repos.mcpConfigs.create(make('ws-b'));
      await repos.mcpConfigs.create(make(null));

      expect(await repos.mcpConfigs.count({ workspaceId: 'ws-a' })).toBe(3);
      expect(await repos.mcpConfigs.count()).toBe(4);
    });

    it('should round trip ids whose prefix contains an underscore', async () => {
      const config = {
        id: generateId(ID_PREFIXES.mcpConfig),
        workspaceId: null,
        createdAt: FIXED_TIME,
        name: 'local',
        mcpServer: { command: 'mcp-server', args: ['--stdio'], env: { TOKEN: 'test-secret' } },
      };
      await repos.mcpConfigs.create(config);

      expect(await repos.mcpConfigs.findOne(config.id)).toEqual(config);
    });
  });

  describe('executions', () => {
    it('should filter executions by workflow', async () => {
      const workflowId = generateId(ID_PREFIXES.workflow);
      const make = (workflow: string) => ({
        id: generateId(ID_PREFIXES.execution),
        workspaceId: null,
        createdAt: FIXED_TIME,
        workflowId: workflow,
        threadId: generateId(ID_PREFIXES.thread),
        runId: generateId(ID_PREFIXES.run),
      });
      const mine = make(workflowId);
      await repos.executions.create(mine);
      await repos.executions.create(make(generateId(ID_PREFIXES.workflow)));

      const listed = await repos.executions.find(parseListQuery({}), { workflowId });

      expect(listed.data).toEqual([mine]);
    });
  });

  describe('files', () => {
    it('should delete file metadata', async () => {
      const file = {
        id: generateId(ID_PREFIXES.file),
        workspaceId: 'ws-a',
        createdAt: FIXED_TIME,
        filename: 'notes.txt',
        size: 12,
        mediaType: 'text/plain',
      };
      await repos.files.create(file);
      await repos.files.delete(file.id, { workspaceId: 'ws-a' });

      await expect(repos.files.findOne(file.id)).rejects.toThrow(NotFoundError);
    });
  });
});
