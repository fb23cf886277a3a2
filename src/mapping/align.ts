import { diffSets } from '../collections/set';
import type { AlignedDatasets } from './types';

/**
 * Boxes every value so that `undefined` entries survive a `get` lookup.
 */
function boxValues<T>(dataset: ReadonlyMap<string, T>): Map<string, { value: T }> {
  const boxed = new Map<string, { value: T }>();
  for (const [name, value] of dataset) {
    boxed.set(name, { value });
  }
  return boxed;
}

/**
 * Partitions two normalized datasets by entry name.
 *
 * Names are compared with {@link diffSets} over the two key sets: removals are
 * the left-only names, additions the right-only names. Entries present on both
 * sides are paired for a later value diff.
 */
export function alignDatasets<L, R>(
  left: ReadonlyMap<string, L>,
  right: ReadonlyMap<string, R>
): AlignedDatasets<L, R> {
  const names = diffSets(new Set(left.keys()), new Set(right.keys()), {
    order: 'sorted'
  });

  const leftValues = boxValues(left);
  const rightValues = boxValues(right);
  const shared = new Map<string, readonly [left: L, right: R]>();

  for (const name of Array.from(leftValues.keys()).sort()) {
    const leftFound = leftValues.get(name);
    const rightFound = rightValues.get(name);
    if (leftFound && rightFound) {
      shared.set(name, [leftFound.value, rightFound.value]);
    }
  }

  return {
    shared,
    leftOnly: [...names.removed],
    rightOnly: [...names.added]
  };
}
