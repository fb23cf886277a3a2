import type { Change, HasChanges } from '../../change/types';
import type { DiffOptions } from '../../options';
import type { ValueStrategy } from '../../strategies/types';
import { diffMaps } from '../map';
import { diffSets } from '../set';

/**
 * Map Diff Input
 * The two maps of a diff test, plus optional per-scenario options.
 */
export type MapDiffInput<K, V> = {
  source: ReadonlyMap<K, V>;
  target: ReadonlyMap<K, V>;
  options?: Partial<DiffOptions<K>>;
};

/**
 * Set Diff Input
 * The two sets of a diff test, plus optional per-scenario options.
 */
export type SetDiffInput<T> = {
  source: ReadonlySet<T>;
  target: ReadonlySet<T>;
  options?: Partial<DiffOptions<T>>;
};

/**
 * Expected buckets of a set diff.
 */
export type SetBuckets<T> = {
  added: T[];
  removed: T[];
};

/**
 * Creates a runner that diffs two maps with a fixed strategy and returns every
 * change in contract order.
 *
 * Per-scenario options are merged first, so the base options win.
 */
export function createMapDiffRunner<K, V, R extends HasChanges>(
  strategy: ValueStrategy<V, R>,
  baseOptions: Partial<DiffOptions<K>> = {}
): (input: MapDiffInput<K, V>) => Change<K, V, R>[] {
  return input =>
    diffMaps(input.source, input.target, strategy, {
      ...input.options,
      ...baseOptions
    })
      .changes()
      .toArray();
}

/**
 * Creates a runner that diffs two sets and returns both buckets.
 */
export function createSetDiffRunner<T>(
  baseOptions: Partial<DiffOptions<T>> = {}
): (input: SetDiffInput<T>) => SetBuckets<T> {
  return input => {
    const changeset = diffSets(input.source, input.target, {
      ...input.options,
      ...baseOptions
    });
    return {
      added: [...changeset.added],
      removed: [...changeset.removed]
    };
  };
}

/**
 * Builds a set-valued map from `[key, elements]` pairs.
 */
export function mapOfSets<K, T>(
  entries: readonly (readonly [K, readonly T[]])[]
): Map<K, Set<T>> {
  return new Map(
    entries.map(([key, elements]): [K, Set<T>] => [key, new Set(elements)])
  );
}
