import type { HasChanges } from '../change/types';

/**
 * Describes the shape of the result a strategy produces, independently of
 * running any comparison.
 *
 * - `leaf`: a `Modification` (`Equal` | `Different`).
 * - `set`: a nested `SetChangeset`.
 * - `map` / `record`: a nested `Changeset` whose values follow `values`.
 * - `arbitrary`: decided per value pair at comparison time.
 * - `custom`: a caller-defined strategy.
 */
export type StrategyShape =
  | { kind: 'leaf' }
  | { kind: 'set' }
  | { kind: 'map'; values: StrategyShape }
  | { kind: 'record'; values: StrategyShape }
  | { kind: 'arbitrary' }
  | { kind: 'custom'; name: string };

/**
 * A per-value comparison strategy.
 *
 * The collection differs depend on nothing else: they call `compare` for each
 * key present on both sides and keep the result iff `hasChanges` says so.
 *
 * Declared with method syntax: `AnyValueStrategy` must accept strategies for
 * narrower value types.
 *
 * @template V - The value type being compared.
 * @template R - The comparison result.
 */
export type ValueStrategy<V, R extends HasChanges> = {
  /**
   * What `compare` returns, as data.
   */
  readonly shape: StrategyShape;

  /**
   * Compares a source value with a target value found at the same key.
   */
  compare(source: V, target: V): R;

  /**
   * Whether a comparison result represents an actual difference.
   */
  hasChanges(result: R): boolean;
};

/**
 * A strategy with its value and result types erased.
 */
export type AnyValueStrategy = ValueStrategy<unknown, HasChanges>;
