import { initialSchema } from './revisions/001-initial-schema.js';
import { addMessageParentId } from './revisions/002-add-message-parent-id.js';
import { importJsonStore } from './revisions/003-import-json-store.js';
import { softDeleteJsonStore } from './revisions/004-soft-delete-json-store.js';
import { uniqueEventSequence } from './revisions/005-unique-event-sequence.js';
import { addRunSteps } from './revisions/006-add-run-steps.js';
import type { Revision } from './types.js';

export const REVISIONS: Revision[] = [
  initialSchema,
  addMessageParentId,
  importJsonStore,
  softDeleteJsonStore,
  uniqueEventSequence,
  addRunSteps,
];

export { MigrationRunner, resolveChain } from './runner.js';
export { backfillMessageParents, columnExists, tableExists } from './shared.js';
export { DELETED_DIR } from './revisions/004-soft-delete-json-store.js';
export type { MigrationContext, Revision } from './types.js';
