import type { HasChanges } from './types';

/**
 * Leaf comparison result for two values that compared equal.
 * Holds a reference to the source value.
 */
export class Equal<V> implements HasChanges {
  readonly type = 'EQUAL';

  constructor(readonly value: V) {}

  hasChanges(): boolean {
    return false;
  }
}

/**
 * Leaf comparison result for two values that compared different.
 * Holds references to both compared values.
 */
export class Different<V> implements HasChanges {
  readonly type = 'DIFFERENT';

  constructor(
    readonly source: V,
    readonly target: V
  ) {}

  hasChanges(): boolean {
    return true;
  }
}

/**
 * Result of a leaf (`simple`) comparison.
 */
export type Modification<V> = Equal<V> | Different<V>;

/**
 * Narrows an arbitrary diff result to a leaf `Modification`.
 */
export function isModification(value: unknown): value is Modification<unknown> {
  return value instanceof Equal || value instanceof Different;
}
