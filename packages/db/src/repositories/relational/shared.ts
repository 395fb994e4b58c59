import { asc, desc, eq, gt, isNull, lt, or, type SQL } from 'drizzle-orm';
import type { AnySQLiteColumn } from 'drizzle-orm/sqlite-core';
import {
  ConflictError,
  StorageError,
  ThreadlineError,
  errorMessage,
  scanOrder,
  stripPrefix,
  toListResponse,
  type ListQuery,
  type ListResponse,
} from '@threadline/sdk';

/** Cursor conditions on a stripped-id column. */
export function cursorWhere(idColumn: AnySQLiteColumn, query: ListQuery): SQL[] {
  const following = query.order === 'asc' ? gt : lt;
  const preceding = query.order === 'asc' ? lt : gt;
  const conditions: SQL[] = [];
  if (query.after !== undefined) conditions.push(following(idColumn, stripPrefix(query.after)));
  if (query.before !== undefined) conditions.push(preceding(idColumn, stripPrefix(query.before)));
  return conditions;
}

export function cursorOrder(idColumn: AnySQLiteColumn, query: ListQuery): SQL {
  return scanOrder(query) === 'asc' ? asc(idColumn) : desc(idColumn);
}

/** Turns `limit + 1` scanned rows into a page in the requested order. */
export function toPage<T>(rows: T[], query: ListQuery, getId: (item: T) => string): ListResponse<T> {
  const hasMore = rows.length > query.limit;
  const page = rows.slice(0, query.limit);
  if (scanOrder(query) !== query.order) page.reverse();
  return toListResponse(page, hasMore, getId);
}

export function workspaceVisible(
  column: AnySQLiteColumn,
  workspaceId: string | null | undefined
): SQL | undefined {
  if (workspaceId === undefined) return undefined;
  if (workspaceId === null) return isNull(column);
  return or(isNull(column), eq(column, workspaceId));
}

function sqliteCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/** Maps driver failures onto the error taxonomy. */
export function guard<T>(action: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof ThreadlineError) throw error;
    const code = sqliteCode(error);
    if (code === 'SQLITE_CONSTRAINT_PRIMARYKEY' || code === 'SQLITE_CONSTRAINT_UNIQUE') {
      throw new ConflictError(`Failed to ${action}: already exists`, { cause: error });
    }
    throw new StorageError(`Failed to ${action}: ${errorMessage(error)}`, { cause: error });
  }
}
