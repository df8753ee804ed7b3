import { describe, it, expect } from 'vitest';
import type { Stamped } from '@petalbrew/shared';
import { dedupeByKey, mergeByKey } from '../upsert';

interface Row {
  id: string;
  name: string;
}

const keyOf = (row: Row) => row.id;
const t0 = new Date('2024-01-01T00:00:00Z');
const t1 = new Date('2024-01-02T00:00:00Z');

describe('mergeByKey', () => {
  it('inserts new keys with both stamps set to now', () => {
    const result = mergeByKey(new Map(), [{ id: 'a', name: 'Rose' }], keyOf, t0);

    expect(result.inserted).toBe(1);
    expect(result.updated).toBe(0);
    expect(result.rows.get('a')).toEqual({ id: 'a', name: 'Rose', createdAt: t0, updatedAt: t0 });
  });

  it('overwrites matched keys and keeps createdAt', () => {
    const existing = new Map<string, Stamped<Row>>([
      ['a', { id: 'a', name: 'Rose', createdAt: t0, updatedAt: t0 }],
    ]);

    const result = mergeByKey(existing, [{ id: 'a', name: 'Red Rose' }], keyOf, t1);

    expect(result.updated).toBe(1);
    expect(result.rows.get('a')).toEqual({ id: 'a', name: 'Red Rose', createdAt: t0, updatedAt: t1 });
  });

  it('keeps rows that are absent from the batch', () => {
    const existing = new Map<string, Stamped<Row>>([
      ['a', { id: 'a', name: 'Rose', createdAt: t0, updatedAt: t0 }],
    ]);

    const result = mergeByKey(existing, [{ id: 'b', name: 'Tulip' }], keyOf, t1);

    expect([...result.rows.keys()]).toEqual(['a', 'b']);
    expect(result.rows.get('a')?.updatedAt).toBe(t0);
  });

  it('lets the last duplicate in a batch win', () => {
    const result = mergeByKey(
      new Map(),
      [
        { id: 'a', name: 'first' },
        { id: 'a', name: 'second' },
      ],
      keyOf,
      t0,
    );

    expect(result.rows.size).toBe(1);
    expect(result.rows.get('a')?.name).toBe('second');
    expect(result.inserted).toBe(1);
    expect(result.updated).toBe(1);
  });

  it('does not mutate the existing map', () => {
    const existing = new Map<string, Stamped<Row>>();
    mergeByKey(existing, [{ id: 'a', name: 'Rose' }], keyOf, t0);
    expect(existing.size).toBe(0);
  });
});

describe('dedupeByKey', () => {
  it('keeps the last row for each key in first-seen order', () => {
    const rows = dedupeByKey(
      [
        { id: 'a', name: 'first' },
        { id: 'b', name: 'Tulip' },
        { id: 'a', name: 'second' },
      ],
      keyOf,
    );

    expect(rows).toEqual([
      { id: 'a', name: 'second' },
      { id: 'b', name: 'Tulip' },
    ]);
  });
});
