/**
 * Capability shared by every per-value diff result.
 *
 * The engine only ever asks a result one question: does it describe an actual
 * difference? Implementations must answer in O(1) without allocating.
 */
export type HasChanges = {
  hasChanges(): boolean;
};

/**
 * Represents an **addition**.
 * The value is present in the target collection and absent from the source.
 */
export type Add<K, V> = {
  /**
   * Discriminator literal identifying the type of change.
   */
  type: 'ADD';
  /**
   * The key the value should be added at.
   */
  key: K;
  /**
   * The value taken from the target collection.
   */
  value: V;
};

/**
 * Represents a **removal**.
 * The value is present in the source collection and absent from the target.
 */
export type Remove<K, V> = {
  /**
   * Discriminator literal identifying the type of change.
   */
  type: 'REMOVE';
  /**
   * The key the value should be removed from.
   */
  key: K;
  /**
   * The value taken from the source collection.
   */
  value: V;
};

/**
 * Represents a **modification**.
 * The key exists in both collections and the value strategy reported a
 * difference between the two values.
 *
 * `modification` is whatever the strategy produced: a leaf `Different`, or a
 * nested changeset when the values were diffed recursively.
 */
export type Modify<K, D extends HasChanges> = {
  /**
   * Discriminator literal identifying the type of change.
   */
  type: 'MODIFY';
  /**
   * The key of the modified value.
   */
  key: K;
  /**
   * The value-level diff. Always reports `hasChanges() === true`.
   */
  modification: D;
};

/**
 * A change that only concerns presence: an addition or a removal.
 */
export type PureChange<K, V> = Add<K, V> | Remove<K, V>;

/**
 * Union of every change a changeset can report.
 */
export type Change<K, V, D extends HasChanges> =
  | Add<K, V>
  | Remove<K, V>
  | Modify<K, D>;
