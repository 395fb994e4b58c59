import { createReadStream, createWriteStream } from 'node:fs';
import { mkdir, rm, stat } from 'node:fs/promises';
import { join } from 'node:path';
import type { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import {
  ConflictError,
  InvalidArgumentError,
  NotFoundError,
  StorageError,
  errorMessage,
} from '@threadline/sdk';
import { errnoCode, isPathSegment, pathSegment } from './repositories/file/store.js';

const GLOBAL_WORKSPACE = '_global';

/** Uploaded file bytes under `<dataDir>/blobs/<workspace>/<fileId>`. */
export class BlobStore {
  readonly root: string;

  constructor(dataDir: string) {
    this.root = join(dataDir, 'blobs');
  }

  dirFor(workspaceId: string | null): string {
    if (workspaceId === null) return join(this.root, GLOBAL_WORKSPACE);
    if (!isPathSegment(workspaceId)) throw new InvalidArgumentError(`Invalid workspace id: ${workspaceId}`);
    return join(this.root, workspaceId);
  }

  pathFor(workspaceId: string | null, fileId: string): string {
    return join(this.dirFor(workspaceId), pathSegment('File', fileId));
  }

  /** Streams `source` to disk and returns the number of bytes written. */
  async write(workspaceId: string | null, fileId: string, source: Readable): Promise<number> {
    const path = this.pathFor(workspaceId, fileId);
    try {
      await mkdir(this.dirFor(workspaceId), { recursive: true });
      await pipeline(source, createWriteStream(path, { flags: 'wx' }));
      return (await stat(path)).size;
    } catch (error) {
      if (errnoCode(error) === 'EEXIST') {
        throw new ConflictError(`File ${fileId} already has content`, { cause: error });
      }
      await rm(path, { force: true });
      throw new StorageError(`Failed to store file ${fileId}: ${errorMessage(error)}`, { cause: error });
    }
  }

  async open(workspaceId: string | null, fileId: string): Promise<Readable> {
    const path = this.pathFor(workspaceId, fileId);
    try {
      await stat(path);
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') throw NotFoundError.forResource('File content', fileId);
      throw new StorageError(`Failed to open file ${fileId}: ${errorMessage(error)}`, { cause: error });
    }
    return createReadStream(path);
  }

  async remove(workspaceId: string | null, fileId: string): Promise<void> {
    const path = this.pathFor(workspaceId, fileId);
    try {
      await rm(path, { force: true });
    } catch (error) {
      throw new StorageError(`Failed to delete file ${fileId}: ${errorMessage(error)}`, { cause: error });
    }
  }
}
