import { z } from 'zod';
import { decodeUnix } from '../time.js';

/** Accepts a `Date` or persisted unix seconds. */
export const timestampSchema = z.union([
  z.date(),
  z.number().int().nonnegative().transform(decodeUnix),
]);

export const optionalTimestampSchema = timestampSchema.nullish().transform((value) => value ?? null);

export const workspaceIdSchema = z.string().min(1).nullish().transform((value) => value ?? null);

export interface WorkspaceScoped {
  workspaceId: string | null;
}

/** Resources without a workspace are visible everywhere. */
export function isVisibleTo(resource: WorkspaceScoped, workspaceId: string | null | undefined): boolean {
  if (workspaceId === undefined) return true;
  return resource.workspaceId === null || resource.workspaceId === workspaceId;
}
