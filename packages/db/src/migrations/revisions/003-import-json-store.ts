/**
 * Revision 3: import a file-backed store.
 *
 * Reads the JSON documents the file backend writes under the data dir and
 * inserts them with INSERT OR IGNORE, so rows that already exist win.
 * Messages written before the tree layout get their parents backfilled.
 * Datetimes stored as strings without an offset are read as wall time in the
 * configured time zone.
 */

import { readFile, readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import {
  assistantSchema,
  encodeUnix,
  executionSchema,
  fileObjectSchema,
  mcpConfigSchema,
  messageSchema,
  parseEventRecord,
  runSchema,
  stripPrefix,
  threadSchema,
  workflowSchema,
  type Assistant,
  type EventRecord,
  type Execution,
  type FileObject,
  type McpConfig,
  type Run,
  type Thread,
  type Workflow,
} from '@threadline/sdk';
import { FILE_STORE_KINDS } from '../../repositories/file/index.js';
import { JsonFileStore, errnoCode } from '../../repositories/file/store.js';
import { ThreadLayout } from '../../repositories/file/threads.js';
import { backfillMessageParents } from '../shared.js';
import type { Revision } from '../types.js';

const legacyMessageSchema = messageSchema.extend({
  parentId: z.string().nullish().transform((value) => value ?? null),
});
type LegacyMessage = z.infer<typeof legacyMessageSchema>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Converts string values of `...At` fields to unix seconds. */
function withUnixTimestamps(document: unknown, timeZone: string): unknown {
  if (!isRecord(document)) return document;
  return Object.fromEntries(
    Object.entries(document).map(([key, value]) =>
      key.endsWith('At') && typeof value === 'string' ? [key, encodeUnix(value, timeZone)] : [key, value]
    )
  );
}

function legacySchema<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, timeZone: string) {
  return z.preprocess((document) => withUnixTimestamps(document, timeZone), schema);
}

interface ThreadBundle {
  thread: Thread;
  messages: LegacyMessage[];
  runs: Array<{ run: Run; events: EventRecord[] }>;
}

interface Snapshot {
  threads: ThreadBundle[];
  assistants: Assistant[];
  workflows: Workflow[];
  files: FileObject[];
  mcpConfigs: McpConfig[];
  executions: Execution[];
}

const unix = (date: Date | null) => (date === null ? null : encodeUnix(date));
const raw = (id: string | null) => (id === null ? null : stripPrefix(id));

async function readEvents(path: string, timeZone: string): Promise<EventRecord[]> {
  try {
    const content = await readFile(path, 'utf8');
    return content
      .split('\n')
      .filter((line) => line.trim().length > 0)
      .map((line) => parseEventRecord(withUnixTimestamps(JSON.parse(line), timeZone)));
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') return [];
    throw error;
  }
}

async function readSnapshot(dataDir: string, timeZone: string): Promise<Snapshot> {
  const layout = new ThreadLayout(dataDir);
  const threadStore = new JsonFileStore<Thread>(legacySchema(threadSchema, timeZone), 'Thread');
  const messageStore = new JsonFileStore<LegacyMessage>(legacySchema(legacyMessageSchema, timeZone), 'Message');
  const runStore = new JsonFileStore<Run>(legacySchema(runSchema, timeZone), 'Run');

  const threads: ThreadBundle[] = [];
  for (const thread of await threadStore.list(layout.root)) {
    const runs = [];
    for (const run of await runStore.list(layout.runsDir(thread.id))) {
      runs.push({ run, events: await readEvents(layout.eventsFile(thread.id, run.id), timeZone) });
    }
    threads.push({
      thread,
      messages: await messageStore.list(layout.messagesDir(thread.id)),
      runs,
    });
  }

  return {
    threads,
    assistants: await new JsonFileStore<Assistant>(legacySchema(assistantSchema, timeZone), 'Assistant').list(
      join(dataDir, 'assistants')
    ),
    workflows: await new JsonFileStore<Workflow>(legacySchema(workflowSchema, timeZone), 'Workflow').list(
      join(dataDir, 'workflows')
    ),
    files: await new JsonFileStore<FileObject>(legacySchema(fileObjectSchema, timeZone), 'File').list(
      join(dataDir, 'files')
    ),
    mcpConfigs: await new JsonFileStore<McpConfig>(legacySchema(mcpConfigSchema, timeZone), 'MCP config').list(
      join(dataDir, 'mcp_configs')
    ),
    executions: await new JsonFileStore<Execution>(legacySchema(executionSchema, timeZone), 'Execution').list(
      join(dataDir, 'executions')
    ),
  };
}

async function hasJsonStore(dataDir: string): Promise<boolean> {
  try {
    const entries = await readdir(dataDir);
    return FILE_STORE_KINDS.some((kind) => entries.includes(kind));
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') return false;
    throw error;
  }
}

export const importJsonStore: Revision = {
  version: 3,
  previous: 2,
  name: 'import-json-store',

  async upgrade({ sqlite, dataDir, logger, timeZone = 'UTC' }) {
    if (!(await hasJsonStore(dataDir))) return;
    const snapshot = await readSnapshot(dataDir, timeZone);

    const insertThread = sqlite.prepare(
      'INSERT OR IGNORE INTO threads (id, workspace_id, created_at, name) VALUES (?, ?, ?, ?)'
    );
    const insertMessage = sqlite.prepare(
      `INSERT OR IGNORE INTO messages (id, thread_id, parent_id, created_at, role, content, assistant_id, run_id)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
    );
    const insertRun = sqlite.prepare(
      `INSERT OR IGNORE INTO runs (id, thread_id, assistant_id, model, instructions, created_at, started_at,
         completed_at, failed_at, cancelled_at, tried_cancelling_at, expires_at, last_error)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
    );
    const hasEvent = sqlite.prepare('SELECT 1 FROM events WHERE run_id = ? AND sequence_num = ?');
    const insertEvent = sqlite.prepare(
      `INSERT INTO events (run_id, thread_id, sequence_num, event_type, event_data, created_at)
       VALUES (?, ?, ?, ?, ?, ?)`
    );
    const insertAssistant = sqlite.prepare(
      `INSERT OR IGNORE INTO assistants (id, workspace_id, created_at, name, description, avatar, tools, system)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
    );
    const insertWorkflow = sqlite.prepare(
      `INSERT OR IGNORE INTO workflows (id, workspace_id, created_at, name, description, assistant_id)
       VALUES (?, ?, ?, ?, ?, ?)`
    );
    const insertWorkflowTag = sqlite.prepare('INSERT INTO workflow_tags (workflow_id, tag) VALUES (?, ?)');
    const insertFile = sqlite.prepare(
      'INSERT OR IGNORE INTO files (id, workspace_id, created_at, filename, size, media_type) VALUES (?, ?, ?, ?, ?, ?)'
    );
    const insertMcpConfig = sqlite.prepare(
      'INSERT OR IGNORE INTO mcp_configs (id, workspace_id, created_at, name, mcp_server) VALUES (?, ?, ?, ?, ?)'
    );
    const insertExecution = sqlite.prepare(
      `INSERT OR IGNORE INTO executions (id, workspace_id, created_at, workflow_id, thread_id, run_id)
       VALUES (?, ?, ?, ?, ?, ?)`
    );

    let imported = 0;
    sqlite.transaction(() => {
      for (const { thread, messages, runs } of snapshot.threads) {
        imported += insertThread.run(raw(thread.id), thread.workspaceId, unix(thread.createdAt), thread.name).changes;
        for (const m of messages) {
          imported += insertMessage.run(
            raw(m.id),
            raw(m.threadId),
            raw(m.parentId),
            unix(m.createdAt),
            m.role,
            JSON.stringify(m.content),
            raw(m.assistantId),
            raw(m.runId)
          ).changes;
        }
        for (const { run, events } of runs) {
          imported += insertRun.run(
            raw(run.id),
            raw(run.threadId),
            raw(run.assistantId),
            run.model,
            run.instructions,
            unix(run.createdAt),
            unix(run.startedAt),
            unix(run.completedAt),
            unix(run.failedAt),
            unix(run.cancelledAt),
            unix(run.triedCancellingAt),
            unix(run.expiresAt),
            run.lastError === null ? null : JSON.stringify(run.lastError)
          ).changes;
          for (const e of events) {
            if (hasEvent.get(raw(e.runId), e.sequenceNum) !== undefined) continue;
            imported += insertEvent.run(
              raw(e.runId),
              raw(e.threadId),
              e.sequenceNum,
              e.eventType,
              JSON.stringify(e.eventData),
              unix(e.createdAt)
            ).changes;
          }
        }
      }
      for (const a of snapshot.assistants) {
        imported += insertAssistant.run(
          raw(a.id),
          a.workspaceId,
          unix(a.createdAt),
          a.name,
          a.description,
          a.avatar,
          JSON.stringify(a.tools),
          a.system
        ).changes;
      }
      for (const w of snapshot.workflows) {
        const changes = insertWorkflow.run(
          raw(w.id),
          w.workspaceId,
          unix(w.createdAt),
          w.name,
          w.description,
          raw(w.assistantId)
        ).changes;
        // Tags only accompany a newly inserted workflow, so re-runs add none.
        if (changes > 0) {
          for (const tag of w.tags) insertWorkflowTag.run(raw(w.id), tag);
        }
        imported += changes;
      }
      for (const f of snapshot.files) {
        imported += insertFile.run(raw(f.id), f.workspaceId, unix(f.createdAt), f.filename, f.size, f.mediaType).changes;
      }
      for (const c of snapshot.mcpConfigs) {
        imported += insertMcpConfig.run(
          raw(c.id),
          c.workspaceId,
          unix(c.createdAt),
          c.name,
          JSON.stringify(c.mcpServer)
        ).changes;
      }
      for (const x of snapshot.executions) {
        imported += insertExecution.run(
          raw(x.id),
          x.workspaceId,
          unix(x.createdAt),
          raw(x.workflowId),
          raw(x.threadId),
          raw(x.runId)
        ).changes;
      }
    })();

    const linked = backfillMessageParents(sqlite);
    logger.info({ imported, linked }, 'Imported JSON store');
  },

  downgrade({ logger }) {
    // Source documents are restored by the soft-delete revision's downgrade;
    // imported rows stay so nothing written since is lost.
    logger.info('Keeping rows imported from the JSON store');
  },
};
