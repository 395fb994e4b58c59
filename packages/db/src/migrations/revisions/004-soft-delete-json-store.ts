/**
 * Revision 4: retire the imported JSON store.
 *
 * Directories move to `<dataDir>/.deleted/<kind>` rather than being removed,
 * so the downgrade can put them back.
 */

import { mkdir, rename } from 'node:fs/promises';
import { join } from 'node:path';
import { FILE_STORE_KINDS } from '../../repositories/file/index.js';
import { pathExists } from '../../repositories/file/store.js';
import type { Revision } from '../types.js';

export const DELETED_DIR = '.deleted';

export const softDeleteJsonStore: Revision = {
  version: 4,
  previous: 3,
  name: 'soft-delete-json-store',

  async upgrade({ dataDir, logger }) {
    for (const kind of FILE_STORE_KINDS) {
      const source = join(dataDir, kind);
      const target = join(dataDir, DELETED_DIR, kind);
      if (!(await pathExists(source))) continue;
      if (await pathExists(target)) {
        logger.warn({ kind }, 'Soft-deleted copy already exists; leaving directory in place');
        continue;
      }
      await mkdir(join(dataDir, DELETED_DIR), { recursive: true });
      await rename(source, target);
      logger.info({ kind }, 'Soft-deleted JSON store directory');
    }
  },

  async downgrade({ dataDir, logger }) {
    for (const kind of FILE_STORE_KINDS) {
      const source = join(dataDir, DELETED_DIR, kind);
      const target = join(dataDir, kind);
      if (!(await pathExists(source)) || (await pathExists(target))) continue;
      await rename(source, target);
      logger.info({ kind }, 'Restored JSON store directory');
    }
  },
};
