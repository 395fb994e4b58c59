/**
 * Unit tests for the blob store
 */

import { readdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { text } from 'node:stream/consumers';
import { Readable } from 'node:stream';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ConflictError, InvalidArgumentError, NotFoundError, StorageError } from '@threadline/sdk';
import { BlobStore } from '../../src/blob-store.js';
import { pathExists } from '../../src/repositories/file/store.js';
import { createTempDir, removeDir } from '../test-utils.js';

describe('BlobStore [unit]', () => {
  let dataDir: string;
  let blobs: BlobStore;

  beforeEach(async () => {
    dataDir = await createTempDir();
    blobs = new BlobStore(dataDir);
  });

  afterEach(async () => {
    await removeDir(dataDir);
  });

  it('should write content and report its size', async () => {
    const size = await blobs.write('ws-a', 'file_1', Readable.from(['hello ', 'world']));

    expect(size).toBe(11);
    expect(await text(await blobs.open('ws-a', 'file_1'))).toBe('hello world');
  });

  it('should keep files without a workspace apart', async () => {
    await blobs.write(null, 'file_1', Readable.from(['shared']));

    await expect(blobs.open('ws-a', 'file_1')).rejects.toThrow(NotFoundError);
    expect(await text(await blobs.open(null, 'file_1'))).toBe('shared');
  });

  it('should refuse to overwrite existing content', async () => {
    await blobs.write('ws-a', 'file_1', Readable.from(['first']));

    await expect(blobs.write('ws-a', 'file_1', Readable.from(['second']))).rejects.toThrow(ConflictError);
    expect(await text(await blobs.open('ws-a', 'file_1'))).toBe('first');
  });

  it('should remove partial content when the source fails', async () => {
    const failing = new Readable({
      read() {
        this.push('partial');
        this.destroy(new Error('connection reset'));
      },
    });

    await expect(blobs.write('ws-a', 'file_2', failing)).rejects.toThrow(StorageError);
    expect(await pathExists(blobs.pathFor('ws-a', 'file_2'))).toBe(false);
  });

  it('should ignore removal of missing content', async () => {
    await expect(blobs.remove('ws-a', 'file_3')).resolves.toBeUndefined();
  });

  it('should reject a workspace id that leaves the blob root', async () => {
    await expect(blobs.write('../../escaped', 'file_1', Readable.from(['outside']))).rejects.toThrow(
      InvalidArgumentError
    );

    expect(await readdir(dataDir)).toEqual([]);
    expect(await readdir(dirname(dataDir))).not.toContain('escaped');
  });

  it('should treat a file id with path segments as missing', async () => {
    await blobs.write('ws-a', 'file_1', Readable.from(['inside']));

    await expect(blobs.open('ws-a', '../ws-a/file_1')).rejects.toThrow(NotFoundError);
    expect(() => blobs.pathFor(null, '..')).toThrow(NotFoundError);
  });
});
