/**
 * Unit tests for file uploads and downloads
 */

import { describe, it, expect, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { contentDispositionFor, sanitizeFileName } from '../../src/modules/files/files.service.js';
import { WORKSPACE, createTestApp, headers, multipartUpload, type TestApp } from '../test-utils.js';

describe('sanitizeFileName [unit]', () => {
  it('should keep only the base name with safe characters', () => {
    expect(sanitizeFileName('../reports/q1?.txt')).toBe('q1_.txt');
    expect(sanitizeFileName('   ')).toBe('file');
  });

  it('should build an attachment disposition', () => {
    expect(contentDispositionFor('my "notes".txt')).toBe('attachment; filename="my _notes_.txt"');
  });
});

describe('Files API [unit]', () => {
  let t: TestApp;

  afterEach(async () => {
    await t.close();
  });

  it('should upload and download a file', async () => {
    t = await createTestApp();

    const uploaded = await t.app.inject({
      method: 'POST',
      url: '/files',
      ...multipartUpload('notes.txt', 'text/plain', 'hello world'),
    });

    expect(uploaded.statusCode).toBe(201);
    const file = uploaded.json();
    expect(file).toMatchObject({
      object: 'file',
      workspace_id: WORKSPACE,
      filename: 'notes.txt',
      size: 11,
      media_type: 'text/plain',
    });
    expect(file.id.startsWith('file_')).toBe(true);
    expect(existsSync(join(t.dataDir, 'blobs', WORKSPACE, file.id))).toBe(true);

    const content = await t.app.inject({ method: 'GET', url: `/files/${file.id}/content`, headers });
    expect(content.statusCode).toBe(200);
    expect(content.body).toBe('hello world');
    expect(content.headers['content-type']).toBe('text/plain');
    expect(content.headers['content-disposition']).toBe('attachment; filename="notes.txt"');
  });

  it('should reject files over the upload limit and keep nothing', async () => {
    t = await createTestApp({ env: { MAX_UPLOAD_BYTES: '8' } });

    const res = await t.app.inject({
      method: 'POST',
      url: '/files',
      ...multipartUpload('notes.txt', 'text/plain', 'hello world'),
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ detail: 'File exceeds the upload limit of 8 bytes' });
    const list = await t.app.inject({ method: 'GET', url: '/files', headers });
    expect(list.json().data).toEqual([]);
  });

  it('should delete the metadata and the bytes', async () => {
    t = await createTestApp();
    const file = (
      await t.app.inject({
        method: 'POST',
        url: '/files',
        ...multipartUpload('data.bin', 'application/octet-stream', 'abc'),
      })
    ).json();

    const res = await t.app.inject({ method: 'DELETE', url: `/files/${file.id}`, headers });

    expect(res.json()).toEqual({ id: file.id, object: 'file.deleted', deleted: true });
    expect(existsSync(join(t.dataDir, 'blobs', WORKSPACE, file.id))).toBe(false);
    const missing = await t.app.inject({ method: 'GET', url: `/files/${file.id}`, headers });
    expect(missing.statusCode).toBe(404);
  });

  it('should hide files of other workspaces', async () => {
    t = await createTestApp();
    const file = (
      await t.app.inject({
        method: 'POST',
        url: '/files',
        ...multipartUpload('notes.txt', 'text/plain', 'hello'),
      })
    ).json();

    const res = await t.app.inject({
      method: 'GET',
      url: `/files/${file.id}/content`,
      headers: { 'x-workspace-id': 'ws-other' },
    });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ detail: `File with id '${file.id}' not found` });
  });

  it('should reject a workspace header that is not a single path segment', async () => {
    t = await createTestApp();
    const upload = multipartUpload('notes.txt', 'text/plain', 'hello');

    const res = await t.app.inject({
      method: 'POST',
      url: '/files',
      payload: upload.payload,
      headers: { ...upload.headers, 'x-workspace-id': '../../escaped' },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ detail: 'Invalid x-workspace-id header' });
    expect(existsSync(join(t.dataDir, '..', 'escaped'))).toBe(false);
  });

  it('should not find files by a traversing id', async () => {
    t = await createTestApp({ env: { STORAGE_BACKEND: 'file' } });

    const res = await t.app.inject({ method: 'GET', url: '/files/..%2F..%2Fescaped/content', headers });

    expect(res.statusCode).toBe(404);
  });
});

