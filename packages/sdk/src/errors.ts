export type ErrorCode =
  | 'not_found'
  | 'conflict'
  | 'limit_reached'
  | 'invalid_argument'
  | 'invalid_state'
  | 'upstream_error'
  | 'storage_error';

export class ThreadlineError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Entity or id is absent, or not visible from the caller's workspace. */
export class NotFoundError extends ThreadlineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('not_found', message, options);
  }

  static forResource(kind: string, id: string): NotFoundError {
    return new NotFoundError(`${kind} with id '${id}' not found`);
  }
}

export class ConflictError extends ThreadlineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('conflict', message, options);
  }
}

export class LimitReachedError extends ThreadlineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('limit_reached', message, options);
  }
}

export class InvalidArgumentError extends ThreadlineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('invalid_argument', message, options);
  }
}

/** A run transition or migration chain that is not permitted from the current state. */
export class InvalidStateError extends ThreadlineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('invalid_state', message, options);
  }
}

/** Failure surfaced by an external model provider while a run executes. */
export class UpstreamError extends ThreadlineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('upstream_error', message, options);
  }
}

export class StorageError extends ThreadlineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('storage_error', message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
