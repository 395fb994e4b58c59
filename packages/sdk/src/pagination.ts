import { z } from 'zod';
import { InvalidArgumentError } from './errors.js';

export const MAX_LIST_LIMIT = 100;
export const DEFAULT_LIST_LIMIT = 20;

export const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(MAX_LIST_LIMIT).default(DEFAULT_LIST_LIMIT),
  order: z.enum(['asc', 'desc']).default('desc'),
  after: z.string().min(1).optional(),
  before: z.string().min(1).optional(),
});

export type ListQuery = z.infer<typeof listQuerySchema>;
export type ListOrder = ListQuery['order'];

export interface ListResponse<T> {
  data: T[];
  firstId: string | null;
  lastId: string | null;
  hasMore: boolean;
}

export interface ListObject<T> {
  object: 'list';
  data: T[];
  first_id: string | null;
  last_id: string | null;
  has_more: boolean;
}

/** Validates raw list parameters (query string or programmatic input). */
export function parseListQuery(input: unknown = {}): ListQuery {
  const result = listQuerySchema.safeParse(input ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join('.') || 'query';
    throw new InvalidArgumentError(`Invalid list parameter '${field}': ${issue?.message ?? 'invalid'}`);
  }
  return result.data;
}

/**
 * Direction in which items are scanned. A lone `before` cursor scans away from
 * the cursor (against the requested order) so the page holds the nearest items.
 */
export function scanOrder(query: ListQuery): ListOrder {
  if (query.before !== undefined && query.after === undefined) {
    return query.order === 'asc' ? 'desc' : 'asc';
  }
  return query.order;
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Cursor pagination over items sorted ascending by id. Cursors are exclusive
 * boundaries compared by id, so a cursor that no longer exists still pages.
 */
export function paginate<T>(
  items: Iterable<T>,
  query: ListQuery,
  getId: (item: T) => string
): ListResponse<T> {
  const { after, before, order, limit } = query;
  // In `desc` order "following" means a smaller id.
  const follows = (id: string, cursor: string) =>
    order === 'asc' ? compareIds(id, cursor) > 0 : compareIds(id, cursor) < 0;

  const window = [...items].filter((item) => {
    const id = getId(item);
    if (after !== undefined && !follows(id, after)) return false;
    if (before !== undefined && !follows(before, id)) return false;
    return true;
  });

  const direction = scanOrder(query);
  window.sort((a, b) =>
    direction === 'asc' ? compareIds(getId(a), getId(b)) : compareIds(getId(b), getId(a))
  );

  const hasMore = window.length > limit;
  const page = window.slice(0, limit);
  if (direction !== order) page.reverse();

  return toListResponse(page, hasMore, getId);
}

export function toListResponse<T>(
  data: T[],
  hasMore: boolean,
  getId: (item: T) => string
): ListResponse<T> {
  const first = data[0];
  const last = data[data.length - 1];
  return {
    data,
    firstId: first === undefined ? null : getId(first),
    lastId: last === undefined ? null : getId(last),
    hasMore,
  };
}

export function toListObject<T, R>(list: ListResponse<T>, serialize: (item: T) => R): ListObject<R> {
  return {
    object: 'list',
    data: list.data.map((item) => serialize(item)),
    first_id: list.firstId,
    last_id: list.lastId,
    has_more: list.hasMore,
  };
}
