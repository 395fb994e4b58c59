/**
 * Unit tests for cursor pagination
 */

import { describe, it, expect } from 'vitest';
import { paginate, parseListQuery, toListObject } from '../../src/pagination.js';
import { InvalidArgumentError } from '../../src/errors.js';

interface Item {
  id: string;
}

const items: Item[] = Array.from({ length: 25 }, (_, i) => ({
  id: `item_${String(i + 1).padStart(2, '0')}`,
}));
const getId = (item: Item) => item.id;
const ids = (list: Item[]) => list.map(getId);

describe('pagination [unit]', () => {
  describe('parseListQuery', () => {
    it('should apply defaults', () => {
      expect(parseListQuery({})).toEqual({ limit: 20, order: 'desc' });
    });

    it('should coerce query string limits', () => {
      expect(parseListQuery({ limit: '5', order: 'asc' })).toEqual({ limit: 5, order: 'asc' });
    });

    it.each([0, 101, -3, 2.5])('should reject limit %s', (limit) => {
      expect(() => parseListQuery({ limit })).toThrow(InvalidArgumentError);
    });

    it('should reject unknown orders', () => {
      expect(() => parseListQuery({ order: 'sideways' })).toThrow(InvalidArgumentError);
    });
  });

  describe('paginate', () => {
    it('should return every item exactly once across after-cursor pages', () => {
      const seen: string[] = [];
      let after: string | undefined;
      const pages = [];
      for (let i = 0; i < 3; i++) {
        const page = paginate(items, parseListQuery({ limit: 10, order: 'asc', after }), getId);
        pages.push(page);
        seen.push(...ids(page.data));
        after = page.lastId ?? undefined;
      }

      expect(seen).toEqual(ids(items));
      expect(pages.map((p) => p.hasMore)).toEqual([true, true, false]);
      expect(pages[2]?.data).toHaveLength(5);
    });

    it('should order descending by default', () => {
      const page = paginate(items, parseListQuery({ limit: 3 }), getId);
      expect(ids(page.data)).toEqual(['item_25', 'item_24', 'item_23']);
      expect(page.firstId).toBe('item_25');
      expect(page.lastId).toBe('item_23');
      expect(page.hasMore).toBe(true);
    });

    it('should follow the cursor in descending order', () => {
      const page = paginate(items, parseListQuery({ limit: 3, after: 'item_23' }), getId);
      expect(ids(page.data)).toEqual(['item_22', 'item_21', 'item_20']);
    });

    it('should return the items nearest a before cursor', () => {
      const page = paginate(items, parseListQuery({ limit: 3, order: 'asc', before: 'item_10' }), getId);
      expect(ids(page.data)).toEqual(['item_07', 'item_08', 'item_09']);
      expect(page.hasMore).toBe(true);
    });

    it('should report no more items at the start of the list', () => {
      const page = paginate(items, parseListQuery({ limit: 5, order: 'asc', before: 'item_03' }), getId);
      expect(ids(page.data)).toEqual(['item_01', 'item_02']);
      expect(page.hasMore).toBe(false);
    });

    it('should treat a cursor that does not exist as a boundary', () => {
      const page = paginate(items, parseListQuery({ limit: 2, order: 'asc', after: 'item_10a' }), getId);
      expect(ids(page.data)).toEqual(['item_11', 'item_12']);
    });

    it('should return an empty page with null ids', () => {
      const page = paginate([], parseListQuery({}), getId);
      expect(page).toEqual({ data: [], firstId: null, lastId: null, hasMore: false });
    });
  });

  describe('toListObject', () => {
    it('should produce the wire envelope', () => {
      const page = paginate(items, parseListQuery({ limit: 1, order: 'asc' }), getId);
      expect(toListObject(page, (item) => item.id)).toEqual({
        object: 'list',
        data: ['item_01'],
        first_id: 'item_01',
        last_id: 'item_01',
        has_more: true,
      });
    });
  });
});
