import type { HasChanges } from '../change/types';
import { Different, Equal } from '../change/modification';
import type { Modification } from '../change/modification';
import type { Changeset, SetChangeset } from '../changeset/changeset';
import { diffMaps, diffRecords } from '../collections/map';
import { diffSets } from '../collections/set';
import type { DiffOptions } from '../options';
import { isStructurallyEqual } from '../utils/equality';
import type { StrategyShape, ValueStrategy } from './types';

export type SimpleOptions<V> = {
  /**
   * Equality used to decide between `Equal` and `Different`.
   *
   * Defaults to {@link isStructurallyEqual}.
   */
  equals: (source: V, target: V) => boolean;
};

/**
 * Result of the `arbitrary` strategy: a leaf modification, or a nested
 * changeset when both values were sets, both were maps or both were plain
 * objects.
 */
export type ArbitraryDiff =
  | Modification<unknown>
  | SetChangeset<unknown>
  | ArbitraryChangeset
  | ArbitraryRecordChangeset;

/**
 * A map changeset produced by the `arbitrary` strategy.
 */
export interface ArbitraryChangeset
  extends Changeset<unknown, unknown, ArbitraryDiff> {}

/**
 * A plain-object changeset produced by the `arbitrary` strategy.
 */
export interface ArbitraryRecordChangeset
  extends Changeset<string, unknown, ArbitraryDiff> {}

function isPlainRecord(
  value: unknown
): value is Readonly<Record<string, unknown>> {
  if (typeof value !== 'object' || value === null) return false;
  const prototype = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

function reportsChanges(result: HasChanges): boolean {
  return result.hasChanges();
}

/**
 * Leaf comparison.
 *
 * Returns `Equal(source)` when the values are equal under `equals`, otherwise
 * `Different(source, target)`. Never recurses, whatever the values contain.
 *
 * @template V - The value type.
 * @param options - Optional equality override.
 */
export function simple<V>(
  options: Partial<SimpleOptions<V>> = {}
): ValueStrategy<V, Modification<V>> {
  const equals = options.equals ?? isStructurallyEqual;

  return {
    shape: { kind: 'leaf' },
    compare(source, target) {
      return equals(source, target)
        ? new Equal(source)
        : new Different(source, target);
    },
    hasChanges: reportsChanges
  };
}

/**
 * Leaf comparison under the nested-map scope name: the values of a nested map
 * are compared "simply".
 */
export const simply = simple;

/**
 * Values are sets; each pair is diffed into a nested `SetChangeset`.
 *
 * @template T - The element type.
 * @param options - Ordering and capture options for the nested diff.
 */
export function setValues<T>(
  options: Partial<DiffOptions<T>> = {}
): ValueStrategy<ReadonlySet<T>, SetChangeset<T>> {
  return {
    shape: { kind: 'set' },
    compare(source, target) {
      return diffSets(source, target, options);
    },
    hasChanges: reportsChanges
  };
}

/**
 * Values are maps; each pair is diffed into a nested `Changeset` whose own
 * values are compared with `inner`.
 *
 * Composes to any depth: `mapValues(mapValues(setValues()))` diffs a
 * map of maps of maps of sets.
 *
 * @template K - The nested map's key type.
 * @template V - The nested map's value type.
 * @template R - The result of `inner`.
 * @param inner - Strategy for the nested map's values.
 * @param options - Ordering and capture options for the nested diff.
 */
export function mapValues<K, V, R extends HasChanges>(
  inner: ValueStrategy<V, R>,
  options: Partial<DiffOptions<K>> = {}
): ValueStrategy<ReadonlyMap<K, V>, Changeset<K, V, R>> {
  return {
    shape: { kind: 'map', values: inner.shape },
    compare(source, target) {
      return diffMaps(source, target, inner, options);
    },
    hasChanges: reportsChanges
  };
}

/**
 * Recursive comparison under the nested-map scope name: the values of a
 * nested map are diffed "arbitrarily" with `inner`.
 */
export const arbitrarily = mapValues;

/**
 * Values are plain objects; each pair is diffed into a nested `Changeset`
 * over their own enumerable string keys.
 *
 * @template V - The property value type.
 * @template R - The result of `inner`.
 * @param inner - Strategy for the properties.
 * @param options - Ordering and capture options for the nested diff.
 */
export function recordValues<V, R extends HasChanges>(
  inner: ValueStrategy<V, R>,
  options: Partial<DiffOptions<string>> = {}
): ValueStrategy<Readonly<Record<string, V>>, Changeset<string, V, R>> {
  return {
    shape: { kind: 'record', values: inner.shape },
    compare(source, target) {
      return diffRecords(source, target, inner, options);
    },
    hasChanges: reportsChanges
  };
}

/**
 * Runtime dispatch on the compared values.
 *
 * Logic:
 * 1. Two `Set`s: nested `SetChangeset`.
 * 2. Two `Map`s: nested `Changeset`, recursing with `arbitrary` for the values.
 * 3. Two plain objects: nested `Changeset` over their own enumerable string
 *    keys, recursing with `arbitrary` for the properties.
 * 4. Anything else (including a `Map` compared with a `Set`, or arrays and
 *    class instances): bottoms out at the `simple` leaf comparison.
 *
 * @param options - Ordering and capture options, applied at every depth.
 */
export function arbitrary(
  options: Partial<DiffOptions<unknown>> = {}
): ValueStrategy<unknown, ArbitraryDiff> {
  const leaf = simple<unknown>();

  const strategy: ValueStrategy<unknown, ArbitraryDiff> = {
    shape: { kind: 'arbitrary' },
    compare(source, target) {
      if (source instanceof Set && target instanceof Set) {
        return diffSets<unknown>(source, target, options);
      }
      if (source instanceof Map && target instanceof Map) {
        return diffMaps<unknown, unknown, ArbitraryDiff>(
          source,
          target,
          strategy,
          options
        );
      }
      if (isPlainRecord(source) && isPlainRecord(target)) {
        return diffRecords<unknown, ArbitraryDiff>(
          source,
          target,
          strategy,
          options
        );
      }
      return leaf.compare(source, target);
    },
    hasChanges: reportsChanges
  };

  return strategy;
}

/**
 * Wraps a caller-defined comparison as a strategy.
 *
 * @param name - Label reported by `describeShape`.
 * @param compare - The comparison.
 */
export function defineStrategy<V, R extends HasChanges>(
  name: string,
  compare: (source: V, target: V) => R
): ValueStrategy<V, R> {
  return {
    shape: { kind: 'custom', name },
    compare,
    hasChanges: reportsChanges
  };
}

/**
 * Renders a strategy shape, e.g. `"map<set>"` or `"record<leaf>"`.
 */
export function describeShape(shape: StrategyShape): string {
  switch (shape.kind) {
    case 'map':
    case 'record':
      return `${shape.kind}<${describeShape(shape.values)}>`;
    case 'custom':
      return shape.name;
    default:
      return shape.kind;
  }
}
