import path from 'path';
import type { Readable } from 'stream';
import {
  ID_PREFIXES,
  LimitReachedError,
  generateId,
  now,
  type FileObject,
  type ListQuery,
  type ListResponse,
} from '@threadline/sdk';
import type { AppContext } from '../../context.js';

/** The multipart file stream; `truncated` is set once the size limit cut it off. */
export type UploadStream = Readable & { truncated: boolean };

export interface FileUpload {
  filename: string;
  mediaType: string;
  content: UploadStream;
}

export function sanitizeFileName(input: string) {
  const basename = path.basename(input).trim();
  const safe = basename.replace(/[^\w.\- ]+/g, '_').replace(/\s+/g, ' ');
  return safe || 'file';
}

export function contentDispositionFor(fileName: string) {
  const safe = sanitizeFileName(fileName).replace(/"/g, '');
  return `attachment; filename="${safe}"`;
}

function uploadLimitError(maxBytes: number) {
  return new LimitReachedError(`File exceeds the upload limit of ${maxBytes} bytes`);
}

/** Stores the bytes first, then the metadata; a failure leaves neither behind. */
export async function uploadFile(ctx: AppContext, workspaceId: string, upload: FileUpload): Promise<FileObject> {
  const id = generateId(ID_PREFIXES.file);
  const { maxUploadBytes } = ctx.config;

  let size: number;
  try {
    size = await ctx.blobs.write(workspaceId, id, upload.content);
  } catch (error) {
    if (upload.content.truncated) throw uploadLimitError(maxUploadBytes);
    throw error;
  }
  if (upload.content.truncated) {
    await ctx.blobs.remove(workspaceId, id);
    throw uploadLimitError(maxUploadBytes);
  }

  try {
    return await ctx.repos.files.create({
      id,
      workspaceId,
      createdAt: now(),
      filename: sanitizeFileName(upload.filename),
      size,
      mediaType: upload.mediaType,
    });
  } catch (error) {
    await ctx.blobs.remove(workspaceId, id);
    throw error;
  }
}

export function getFile(ctx: AppContext, workspaceId: string, fileId: string): Promise<FileObject> {
  return ctx.repos.files.findOne(fileId, { workspaceId });
}

export function listFiles(
  ctx: AppContext,
  workspaceId: string,
  query: ListQuery
): Promise<ListResponse<FileObject>> {
  return ctx.repos.files.find(query, { workspaceId });
}

export async function openFileContent(
  ctx: AppContext,
  workspaceId: string,
  fileId: string
): Promise<{ file: FileObject; content: Readable }> {
  const file = await getFile(ctx, workspaceId, fileId);
  return { file, content: await ctx.blobs.open(file.workspaceId, file.id) };
}

export async function deleteFile(ctx: AppContext, workspaceId: string, fileId: string): Promise<void> {
  const file = await getFile(ctx, workspaceId, fileId);
  await ctx.repos.files.delete(file.id, { workspaceId });
  await ctx.blobs.remove(file.workspaceId, file.id);
}
