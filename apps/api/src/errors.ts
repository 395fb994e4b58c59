import { ZodError } from 'zod';
import {
  ConflictError,
  InvalidArgumentError,
  InvalidStateError,
  LimitReachedError,
  NotFoundError,
  UpstreamError,
} from '@threadline/sdk';

export interface HttpError {
  statusCode: number;
  detail: string;
}

export const INTERNAL_ERROR_DETAIL = 'Internal Server Error';

function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'body'}: ${issue.message}`)
    .join('; ');
}

function clientStatusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('statusCode' in error)) return undefined;
  const { statusCode } = error;
  return typeof statusCode === 'number' && statusCode >= 400 && statusCode < 500 ? statusCode : undefined;
}

/** Maps a thrown error to the response status and its `detail`. */
export function toHttpError(error: unknown): HttpError {
  if (error instanceof ZodError) {
    return { statusCode: 422, detail: formatZodError(error) };
  }
  if (error instanceof NotFoundError) {
    return { statusCode: 404, detail: error.message };
  }
  if (
    error instanceof ConflictError ||
    error instanceof LimitReachedError ||
    error instanceof InvalidArgumentError
  ) {
    return { statusCode: 400, detail: error.message };
  }
  if (error instanceof InvalidStateError) {
    return { statusCode: 409, detail: error.message };
  }
  if (error instanceof UpstreamError) {
    return { statusCode: 502, detail: error.message };
  }
  const clientStatus = clientStatusOf(error);
  if (clientStatus !== undefined && error instanceof Error) {
    return { statusCode: clientStatus, detail: error.message };
  }
  return { statusCode: 500, detail: INTERNAL_ERROR_DETAIL };
}
