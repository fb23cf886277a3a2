import { SetChangeset } from '../changeset/changeset';
import type { DiffOptions } from '../options';
import { captureValue, normalizeDiffOptions } from '../options';

/**
 * Collects the elements of `from` that are not members of `other`,
 * in `from`'s iteration order.
 */
function difference<T>(from: ReadonlySet<T>, other: ReadonlySet<T>): T[] {
  const result: T[] = [];
  for (const element of from) {
    if (!other.has(element)) result.push(element);
  }
  return result;
}

/**
 * Computes the changeset that turns the `source` set into the `target` set.
 *
 * Logic:
 * 1. Additions: `target − source`.
 * 2. Removals: `source − target`.
 * 3. Ordering: iteration order of the set the elements come from, or ascending
 *    `compareKeys` order in `'sorted'` mode.
 *
 * Membership is native `Set` membership (SameValueZero). There is no modify
 * case: an element is present or it is not.
 *
 * @template T - The element type.
 * @param source - The original set.
 * @param target - The set to reach.
 * @param options - Ordering and capture options.
 */
export function diffSets<T>(
  source: ReadonlySet<T>,
  target: ReadonlySet<T>,
  options: Partial<DiffOptions<T>> = {}
): SetChangeset<T> {
  const { order, compareKeys, capture } = normalizeDiffOptions(options);

  const added = difference(target, source);
  const removed = difference(source, target);

  if (order === 'sorted') {
    added.sort(compareKeys);
    removed.sort(compareKeys);
  }

  return new SetChangeset(
    added.map(element => captureValue(element, capture)),
    removed.map(element => captureValue(element, capture))
  );
}
