/**
 * Revision 2: messages form a tree.
 *
 * Adds `messages.parent_id` and links existing messages into a single chain
 * per thread, ordered by id.
 */

import { backfillMessageParents, columnExists } from '../shared.js';
import type { Revision } from '../types.js';

export const addMessageParentId: Revision = {
  version: 2,
  previous: 1,
  name: 'add-message-parent-id',

  upgrade({ sqlite, logger }) {
    if (!columnExists(sqlite, 'messages', 'parent_id')) {
      sqlite.exec('ALTER TABLE messages ADD COLUMN parent_id TEXT');
    }
    const linked = backfillMessageParents(sqlite);
    if (linked > 0) logger.info({ linked }, 'Backfilled message parents');
  },

  downgrade({ sqlite }) {
    if (columnExists(sqlite, 'messages', 'parent_id')) {
      sqlite.exec('ALTER TABLE messages DROP COLUMN parent_id');
    }
  },
};
