/**
 * Occurrence counts keyed by a categorical value. Map insertion order records
 * when each key was first seen.
 */
export type FrequencyTable<K> = Map<K, number>;

export interface RankedEntry<K> {
  key: K;
  count: number;
}

export function countInto<K>(table: FrequencyTable<K>, key: K): void {
  table.set(key, (table.get(key) ?? 0) + 1);
}

/**
 * Entries by descending count; equal counts keep first-seen order.
 */
export function rankEntries<K>(table: FrequencyTable<K>): RankedEntry<K>[] {
  return [...table]
    .map(([key, count]) => ({ key, count }))
    .sort((a, b) => b.count - a.count);
}
