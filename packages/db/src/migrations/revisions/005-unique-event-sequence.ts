/**
 * Revision 5: one event per (run, sequence number).
 */

import type { Revision } from '../types.js';

export const uniqueEventSequence: Revision = {
  version: 5,
  previous: 4,
  name: 'unique-event-sequence',

  upgrade({ sqlite }) {
    sqlite.exec(`
      CREATE UNIQUE INDEX IF NOT EXISTS uidx_events_run_sequence ON events(run_id, sequence_num);
      DROP INDEX IF EXISTS idx_events_run_sequence;
    `);
  },

  downgrade({ sqlite }) {
    sqlite.exec(`
      CREATE INDEX IF NOT EXISTS idx_events_run_sequence ON events(run_id, sequence_num);
      DROP INDEX IF EXISTS uidx_events_run_sequence;
    `);
  },
};
