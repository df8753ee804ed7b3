/**
 * Keyed merge of a staged batch into an existing model table.
 *
 * Matched keys overwrite every non-key field and bump `updatedAt`, keeping
 * `createdAt`; unmatched keys are inserted with both stamps set to `now`.
 * Rows are never removed. Within one batch the last row for a key wins.
 */

import type { Stamped } from '@petalbrew/shared';

export interface MergeResult<T> {
  rows: Map<string, Stamped<T>>;
  inserted: number;
  updated: number;
}

export function mergeByKey<T>(
  existing: ReadonlyMap<string, Stamped<T>>,
  incoming: readonly T[],
  keyOf: (row: T) => string,
  now: Date,
): MergeResult<T> {
  const rows = new Map(existing);
  let inserted = 0;
  let updated = 0;

  for (const row of incoming) {
    const key = keyOf(row);
    const current = rows.get(key);

    if (current) {
      rows.set(key, { ...row, createdAt: current.createdAt, updatedAt: now });
      updated++;
    } else {
      rows.set(key, { ...row, createdAt: now, updatedAt: now });
      inserted++;
    }
  }

  return { rows, inserted, updated };
}

/** Collapse a batch to one row per key; the last row for a key wins. */
export function dedupeByKey<T>(rows: readonly T[], keyOf: (row: T) => string): T[] {
  const byKey = new Map<string, T>();
  for (const row of rows) byKey.set(keyOf(row), row);
  return [...byKey.values()];
}
