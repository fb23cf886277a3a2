/**
 * Comparator used to order keys (or set elements) when `order` is `'sorted'`.
 */
export type KeyComparator<K> = (a: K, b: K) => number;

export type DiffOptions<K> = {
  /**
   * Controls the order of entries within each bucket.
   *
   * - **"insertion"**:
   *   Keys are visited in source insertion order, then target-only keys in
   *   target insertion order. Buckets follow that order.
   *
   * - **"sorted"**:
   *   The key-space union is stably sorted with `compareKeys`. Buckets come
   *   out in ascending key order regardless of how the inputs were built.
   */
  order: 'insertion' | 'sorted';

  /**
   * Key ordering used in `'sorted'` mode. Ignored in `'insertion'` mode.
   *
   * Defaults to {@link defaultCompareKeys}.
   */
  compareKeys: KeyComparator<K>;

  /**
   * Controls how keys and values are held by the resulting changeset.
   *
   * - **"reference"**:
   *   The changeset references the inputs' own keys and values. Nothing is
   *   copied; mutating an input after the diff is visible through the
   *   changeset.
   *
   * - **"snapshot"**:
   *   Every captured key and value is copied with `structuredClone`. Costs one
   *   deep copy per reported entry and requires structured-cloneable data
   *   (no functions, no class identity), in exchange for a changeset that is
   *   independent of later mutations.
   */
  capture: 'reference' | 'snapshot';
};

/**
 * Orders numbers and bigints numerically and everything else by the
 * code-point order of `String(key)`.
 *
 * Mixed number/bigint pairs compare numerically as well.
 */
export function defaultCompareKeys<K>(a: K, b: K): number {
  if (
    (typeof a === 'number' || typeof a === 'bigint') &&
    (typeof b === 'number' || typeof b === 'bigint')
  ) {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
  }

  const left = String(a);
  const right = String(b);
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

/**
 * Merges the provided partial options with the library defaults.
 *
 * Default settings:
 * - `order`: `'insertion'`.
 * - `compareKeys`: {@link defaultCompareKeys}.
 * - `capture`: `'reference'` (no copies).
 *
 * @param options - The user-provided partial options.
 * @returns A complete `DiffOptions` object.
 */
export function normalizeDiffOptions<K>(
  options: Partial<DiffOptions<K>> = {}
): DiffOptions<K> {
  return {
    order: 'insertion',
    compareKeys: defaultCompareKeys,
    capture: 'reference',
    ...options
  };
}

/**
 * Returns the value itself, or a deep copy when `capture` is `'snapshot'`.
 */
export function captureValue<T>(
  value: T,
  capture: DiffOptions<unknown>['capture']
): T {
  return capture === 'snapshot' ? structuredClone(value) : value;
}
