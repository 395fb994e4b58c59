/**
 * Revision 1: initial relational schema.
 *
 * Messages start without `parent_id`; revision 2 adds it.
 */

import { InvalidStateError } from '@threadline/sdk';
import type { Revision } from '../types.js';

const SCHEMA = `
CREATE TABLE IF NOT EXISTS threads (
    id TEXT PRIMARY KEY,
    workspace_id TEXT,
    created_at INTEGER NOT NULL,
    name TEXT
);
CREATE INDEX IF NOT EXISTS idx_threads_workspace ON threads(workspace_id);

CREATE TABLE IF NOT EXISTS messages (
    id TEXT PRIMARY KEY,
    thread_id TEXT NOT NULL REFERENCES threads(id) ON DELETE CASCADE,
    created_at INTEGER NOT NULL,
    role TEXT NOT NULL CHECK(role IN ('user', 'assistant')),
    content TEXT NOT NULL,
    assistant_id TEXT,
    run_id TEXT
);
CREATE INDEX IF NOT EXISTS idx_messages_thread ON messages(thread_id, id);

CREATE TABLE IF NOT EXISTS runs (
    id TEXT PRIMARY KEY,
    thread_id TEXT NOT NULL REFERENCES threads(id) ON DELETE CASCADE,
    assistant_id TEXT NOT NULL,
    model TEXT NOT NULL,
    instructions TEXT,
    created_at INTEGER NOT NULL,
    started_at INTEGER,
    completed_at INTEGER,
    failed_at INTEGER,
    cancelled_at INTEGER,
    tried_cancelling_at INTEGER,
    expires_at INTEGER NOT NULL,
    last_error TEXT
);
CREATE INDEX IF NOT EXISTS idx_runs_thread ON runs(thread_id, id);

CREATE TABLE IF NOT EXISTS events (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    run_id TEXT NOT NULL REFERENCES runs(id) ON DELETE CASCADE,
    thread_id TEXT NOT NULL,
    sequence_num INTEGER NOT NULL,
    event_type TEXT NOT NULL,
    event_data TEXT NOT NULL,
    created_at INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_events_run_sequence ON events(run_id, sequence_num);

CREATE TABLE IF NOT EXISTS assistants (
    id TEXT PRIMARY KEY,
    workspace_id TEXT,
    created_at INTEGER NOT NULL,
    name TEXT,
    description TEXT,
    avatar TEXT,
    tools TEXT NOT NULL DEFAULT '[]',
    system TEXT
);
CREATE INDEX IF NOT EXISTS idx_assistants_workspace ON assistants(workspace_id);

CREATE TABLE IF NOT EXISTS workflows (
    id TEXT PRIMARY KEY,
    workspace_id TEXT,
    created_at INTEGER NOT NULL,
    name TEXT NOT NULL,
    description TEXT NOT NULL,
    assistant_id TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_workflows_workspace ON workflows(workspace_id);

CREATE TABLE IF NOT EXISTS workflow_tags (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    workflow_id TEXT NOT NULL REFERENCES workflows(id) ON DELETE CASCADE,
    tag TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_workflow_tags_tag ON workflow_tags(tag, workflow_id);

CREATE TABLE IF NOT EXISTS files (
    id TEXT PRIMARY KEY,
    workspace_id TEXT,
    created_at INTEGER NOT NULL,
    filename TEXT NOT NULL,
    size INTEGER NOT NULL,
    media_type TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_files_workspace ON files(workspace_id);

CREATE TABLE IF NOT EXISTS mcp_configs (
    id TEXT PRIMARY KEY,
    workspace_id TEXT,
    created_at INTEGER NOT NULL,
    name TEXT NOT NULL,
    mcp_server TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_mcp_configs_workspace ON mcp_configs(workspace_id);

CREATE TABLE IF NOT EXISTS executions (
    id TEXT PRIMARY KEY,
    workspace_id TEXT,
    created_at INTEGER NOT NULL,
    workflow_id TEXT NOT NULL,
    thread_id TEXT NOT NULL,
    run_id TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_executions_workflow ON executions(workflow_id);
CREATE INDEX IF NOT EXISTS idx_executions_thread ON executions(thread_id);
`;

export const initialSchema: Revision = {
  version: 1,
  previous: null,
  name: 'initial-schema',

  upgrade({ sqlite }) {
    sqlite.exec(SCHEMA);
  },

  downgrade() {
    throw new InvalidStateError('The initial schema cannot be downgraded');
  },
};
