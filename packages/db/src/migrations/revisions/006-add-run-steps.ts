/**
 * Revision 6: persisted run steps.
 */

import type { Revision } from '../types.js';

export const addRunSteps: Revision = {
  version: 6,
  previous: 5,
  name: 'add-run-steps',

  upgrade({ sqlite }) {
    sqlite.exec(`
      CREATE TABLE IF NOT EXISTS run_steps (
          id TEXT PRIMARY KEY,
          run_id TEXT NOT NULL REFERENCES runs(id) ON DELETE CASCADE,
          thread_id TEXT NOT NULL,
          assistant_id TEXT NOT NULL,
          type TEXT NOT NULL CHECK(type IN ('message_creation', 'tool_calls')),
          step_details TEXT NOT NULL,
          created_at INTEGER NOT NULL,
          completed_at INTEGER,
          failed_at INTEGER,
          cancelled_at INTEGER,
          expired_at INTEGER,
          last_error TEXT
      );
      CREATE INDEX IF NOT EXISTS idx_run_steps_run ON run_steps(run_id, id);
    `);
  },

  downgrade({ sqlite }) {
    sqlite.exec(`
      DROP INDEX IF EXISTS idx_run_steps_run;
      DROP TABLE IF EXISTS run_steps;
    `);
  },
};
