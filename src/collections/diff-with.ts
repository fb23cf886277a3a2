import type { HasChanges } from '../change/types';
import type { Modification } from '../change/modification';
import type { Changeset, SetChangeset } from '../changeset/changeset';
import type { DiffOptions } from '../options';
import type { AnyValueStrategy, ValueStrategy } from '../strategies/types';
import { diffMaps, diffRecords } from './map';
import { diffSets } from './set';

type Collection =
  | ReadonlySet<unknown>
  | ReadonlyMap<unknown, unknown>
  | Readonly<Record<string, unknown>>;

function isValueStrategy(value: unknown): value is AnyValueStrategy {
  return (
    typeof value === 'object' &&
    value !== null &&
    'compare' in value &&
    typeof value.compare === 'function' &&
    'hasChanges' in value &&
    typeof value.hasChanges === 'function'
  );
}

function isPlainRecord(
  value: unknown
): value is Readonly<Record<string, unknown>> {
  if (typeof value !== 'object' || value === null) return false;
  const prototype = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

function describeCollection(value: unknown): string {
  if (value instanceof Set) return 'Set';
  if (value instanceof Map) return 'Map';
  if (isPlainRecord(value)) return 'plain object';
  return Object.prototype.toString.call(value);
}

/**
 * Single entry point over every supported collection type.
 *
 * Dispatch:
 * 1. Two `Set`s: {@link diffSets}. A strategy argument is rejected, since
 *    sets have no values to compare.
 * 2. Two `Map`s: {@link diffMaps} with the given strategy (leaf equality when
 *    omitted).
 * 3. Two plain objects: {@link diffRecords}.
 *
 * @throws {TypeError} When the two collections are not of the same supported
 *   kind, or when a strategy is passed for sets.
 */
export function diffWith<T>(
  source: ReadonlySet<T>,
  target: ReadonlySet<T>,
  options?: Partial<DiffOptions<T>>
): SetChangeset<T>;

export function diffWith<K, V>(
  source: ReadonlyMap<K, V>,
  target: ReadonlyMap<K, V>,
  options?: Partial<DiffOptions<K>>
): Changeset<K, V, Modification<V>>;

export function diffWith<K, V, R extends HasChanges>(
  source: ReadonlyMap<K, V>,
  target: ReadonlyMap<K, V>,
  strategy: ValueStrategy<V, R>,
  options?: Partial<DiffOptions<K>>
): Changeset<K, V, R>;

export function diffWith<V>(
  source: Readonly<Record<string, V>>,
  target: Readonly<Record<string, V>>,
  options?: Partial<DiffOptions<string>>
): Changeset<string, V, Modification<V>>;

export function diffWith<V, R extends HasChanges>(
  source: Readonly<Record<string, V>>,
  target: Readonly<Record<string, V>>,
  strategy: ValueStrategy<V, R>,
  options?: Partial<DiffOptions<string>>
): Changeset<string, V, R>;

export function diffWith(
  source: Collection,
  target: Collection,
  strategyOrOptions?: AnyValueStrategy | Partial<DiffOptions<unknown>>,
  maybeOptions?: Partial<DiffOptions<unknown>>
): Changeset<unknown, unknown, HasChanges> | SetChangeset<unknown> {
  let strategy: AnyValueStrategy | undefined;
  let options: Partial<DiffOptions<unknown>>;
  if (isValueStrategy(strategyOrOptions)) {
    strategy = strategyOrOptions;
    options = maybeOptions ?? {};
  } else {
    strategy = undefined;
    options = strategyOrOptions ?? {};
  }

  if (source instanceof Set && target instanceof Set) {
    if (strategy) {
      throw new TypeError(
        'diffWith: sets are compared by membership only and take no value strategy.'
      );
    }
    return diffSets<unknown>(source, target, options);
  }

  if (source instanceof Map && target instanceof Map) {
    return strategy
      ? diffMaps<unknown, unknown, HasChanges>(source, target, strategy, options)
      : diffMaps<unknown, unknown>(source, target, undefined, options);
  }

  if (isPlainRecord(source) && isPlainRecord(target)) {
    return strategy
      ? diffRecords<unknown, HasChanges>(source, target, strategy, options)
      : diffRecords<unknown>(source, target, undefined, options);
  }

  throw new TypeError(
    `diffWith: expected two Sets, two Maps or two plain objects, received ${describeCollection(source)} and ${describeCollection(target)}.`
  );
}
