import type { Add, HasChanges, Modify, Remove } from '../change/types';
import type { Modification } from '../change/modification';
import { createAdd, createModify, createRemove } from '../change/factories';
import { Changeset } from '../changeset/changeset';
import { invariant } from '../errors';
import type { DiffOptions } from '../options';
import { captureValue, normalizeDiffOptions } from '../options';
import { simple } from '../strategies/presets';
import type { ValueStrategy } from '../strategies/types';

/**
 * A value found on one side of the diff, boxed so that an `undefined` value is
 * distinguishable from an absent key.
 */
type Found<V> = { value: V };

/**
 * One key of the key-space union with the values found on each side.
 */
type KeySlot<K, V> = {
  key: K;
  source?: Found<V>;
  target?: Found<V>;
};

/**
 * Builds the union of `keys(source) ∪ keys(target)`, one slot per key.
 *
 * Logic:
 * 1. Source pass: one slot per source entry, in source insertion order.
 * 2. Target pass: fills the slot of keys already seen, appends a new slot for
 *    target-only keys (in target insertion order).
 * 3. Ordering: in `'sorted'` mode, slots are sorted by key with the configured
 *    comparator (stable, so keys the comparator ties keep insertion order).
 *
 * Slots are keyed by the maps' own SameValueZero identity, so the partition
 * stays exact even when the comparator ties two distinct keys.
 */
function collectKeySlots<K, V>(
  source: ReadonlyMap<K, V>,
  target: ReadonlyMap<K, V>,
  options: DiffOptions<K>
): KeySlot<K, V>[] {
  const slots = new Map<K, KeySlot<K, V>>();

  for (const [key, value] of source) {
    slots.set(key, { key, source: { value } });
  }

  for (const [key, value] of target) {
    const slot = slots.get(key);
    if (slot) {
      slot.target = { value };
    } else {
      slots.set(key, { key, target: { value } });
    }
  }

  const ordered = Array.from(slots.values());
  if (options.order === 'sorted') {
    ordered.sort((a, b) => options.compareKeys(a.key, b.key));
  }
  return ordered;
}

/**
 * Partitions the key space of two maps and packs the result.
 *
 * Logic:
 * 1. Union: collects every key of both maps (see {@link collectKeySlots}).
 * 2. Classification per key:
 *    - target only: `Add(key, targetValue)`.
 *    - source only: `Remove(key, sourceValue)`.
 *    - both: `strategy.compare(sourceValue, targetValue)`; kept as
 *      `Modify(key, result)` iff `strategy.hasChanges(result)`, dropped
 *      otherwise.
 *    - neither: unreachable by construction of the union; asserted.
 * 3. Packing: the three buckets become a frozen `Changeset`.
 */
function partitionKeySpace<K, V, R extends HasChanges>(
  source: ReadonlyMap<K, V>,
  target: ReadonlyMap<K, V>,
  strategy: ValueStrategy<V, R>,
  options: DiffOptions<K>
): Changeset<K, V, R> {
  const added: Add<K, V>[] = [];
  const removed: Remove<K, V>[] = [];
  const modified: Modify<K, R>[] = [];
  const { capture } = options;

  for (const slot of collectKeySlots(source, target, options)) {
    const { key } = slot;

    if (slot.source && slot.target) {
      const result = strategy.compare(
        captureValue(slot.source.value, capture),
        captureValue(slot.target.value, capture)
      );
      if (strategy.hasChanges(result)) {
        modified.push(createModify(captureValue(key, capture), result));
      }
      continue;
    }

    if (slot.target) {
      added.push(
        createAdd(
          captureValue(key, capture),
          captureValue(slot.target.value, capture)
        )
      );
      continue;
    }

    invariant(
      slot.source,
      'a key of the key-space union was found in neither the source nor the target map'
    );
    removed.push(
      createRemove(
        captureValue(key, capture),
        captureValue(slot.source.value, capture)
      )
    );
  }

  return new Changeset(added, removed, modified);
}

/**
 * Computes the changeset that turns `source` into `target`.
 *
 * Values present under the same key on both sides are compared with
 * `strategy` (leaf equality via `simple()` when omitted). Neither input is
 * mutated; see {@link Changeset} for the reference contract of the result.
 *
 * @template K - The key type.
 * @template V - The value type.
 * @template R - The result of the value strategy.
 * @param source - The original map.
 * @param target - The map to reach.
 * @param strategy - Value comparison strategy.
 * @param options - Ordering and capture options.
 * @returns The additions, removals and modifications between the two maps.
 */
export function diffMaps<K, V>(
  source: ReadonlyMap<K, V>,
  target: ReadonlyMap<K, V>,
  strategy?: undefined,
  options?: Partial<DiffOptions<K>>
): Changeset<K, V, Modification<V>>;

export function diffMaps<K, V, R extends HasChanges>(
  source: ReadonlyMap<K, V>,
  target: ReadonlyMap<K, V>,
  strategy: ValueStrategy<V, R>,
  options?: Partial<DiffOptions<K>>
): Changeset<K, V, R>;

export function diffMaps<K, V>(
  source: ReadonlyMap<K, V>,
  target: ReadonlyMap<K, V>,
  strategy: ValueStrategy<V, HasChanges> = simple<V>(),
  options: Partial<DiffOptions<K>> = {}
): Changeset<K, V, HasChanges> {
  return partitionKeySpace(
    source,
    target,
    strategy,
    normalizeDiffOptions(options)
  );
}

/**
 * Computes the changeset between two plain objects, keyed by their own
 * enumerable string properties.
 *
 * @template V - The property value type.
 * @template R - The result of the value strategy.
 * @param source - The original object.
 * @param target - The object to reach.
 * @param strategy - Value comparison strategy.
 * @param options - Ordering and capture options.
 */
export function diffRecords<V>(
  source: Readonly<Record<string, V>>,
  target: Readonly<Record<string, V>>,
  strategy?: undefined,
  options?: Partial<DiffOptions<string>>
): Changeset<string, V, Modification<V>>;

export function diffRecords<V, R extends HasChanges>(
  source: Readonly<Record<string, V>>,
  target: Readonly<Record<string, V>>,
  strategy: ValueStrategy<V, R>,
  options?: Partial<DiffOptions<string>>
): Changeset<string, V, R>;

export function diffRecords<V>(
  source: Readonly<Record<string, V>>,
  target: Readonly<Record<string, V>>,
  strategy: ValueStrategy<V, HasChanges> = simple<V>(),
  options: Partial<DiffOptions<string>> = {}
): Changeset<string, V, HasChanges> {
  return partitionKeySpace(
    new Map(Object.entries(source)),
    new Map(Object.entries(target)),
    strategy,
    normalizeDiffOptions(options)
  );
}
