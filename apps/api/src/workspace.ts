import type { FastifyRequest } from 'fastify';
import { InvalidArgumentError } from '@threadline/sdk';

export const WORKSPACE_HEADER = 'x-workspace-id';

/** Workspace ids name a storage directory, so they are limited to one safe path segment. */
const WORKSPACE_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

export function workspaceIdOf(req: FastifyRequest): string {
  const header = req.headers[WORKSPACE_HEADER];
  const workspaceId = Array.isArray(header) ? header[0] : header;
  if (!workspaceId) {
    throw new InvalidArgumentError(`Missing ${WORKSPACE_HEADER} header`);
  }
  if (!WORKSPACE_ID_PATTERN.test(workspaceId)) {
    throw new InvalidArgumentError(`Invalid ${WORKSPACE_HEADER} header`);
  }
  return workspaceId;
}
