import type { Add, HasChanges, Modify, Remove } from './types';

/**
 * Factory function to construct an `Add` change.
 *
 * @param key - The key the value appears at in the target.
 * @param value - The added value.
 */
export function createAdd<K, V>(key: K, value: V): Add<K, V> {
  return { type: 'ADD', key, value };
}

/**
 * Factory function to construct a `Remove` change.
 *
 * @param key - The key the value appears at in the source.
 * @param value - The removed value.
 */
export function createRemove<K, V>(key: K, value: V): Remove<K, V> {
  return { type: 'REMOVE', key, value };
}

/**
 * Factory function to construct a `Modify` change.
 *
 * Callers are responsible for only passing results whose `hasChanges()` is
 * true; the collection differs enforce this through the value strategy.
 *
 * @param key - The key present in both collections.
 * @param modification - The value-level diff.
 */
export function createModify<K, D extends HasChanges>(
  key: K,
  modification: D
): Modify<K, D> {
  return { type: 'MODIFY', key, modification };
}
