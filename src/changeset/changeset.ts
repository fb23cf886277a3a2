import type { Add, HasChanges, Modify, Remove } from '../change/types';
import { createAdd, createRemove } from '../change/factories';
import {
  Additions,
  Changes,
  Modifications,
  PureChanges,
  Removals,
  mapIterable
} from './iterators';

/**
 * Bucket sizes of a changeset.
 */
export type ChangeCounts = {
  added: number;
  removed: number;
  modified: number;
};

/**
 * The read surface shared by every changeset.
 *
 * Consumers (reports, nested strategies) depend on this contract rather than
 * on a concrete changeset class, so map and set results can be handled
 * uniformly.
 *
 * @template K - The key type of the diffed collection.
 * @template V - The value type of the diffed collection.
 * @template D - The value-level diff carried by modifications.
 */
export type ChangesetView<K, V, D extends HasChanges> = HasChanges & {
  /**
   * `true` iff there are no additions, removals or modifications.
   */
  isEmpty(): boolean;
  counts(): ChangeCounts;
  additions(): Additions<K, V>;
  removals(): Removals<K, V>;
  modifications(): Modifications<K, D>;
  pureChanges(): PureChanges<K, V>;
  changes(): Changes<K, V, D>;
};

/**
 * The result of diffing two keyed collections (maps or records).
 *
 * Lifecycle contract:
 * The buckets hold references to the keys and values of both inputs (unless
 * the diff ran with `capture: 'snapshot'`). Mutating either input after the
 * diff does not update the changeset and may make its references stale, so
 * consume it before mutating the inputs.
 *
 * Every accessor returns a new, independent iterator; the buckets themselves
 * are frozen.
 *
 * @template K - The key type.
 * @template V - The value type.
 * @template D - The value-level diff produced by the value strategy.
 */
export class Changeset<K, V, D extends HasChanges>
  implements ChangesetView<K, V, D>
{
  readonly kind = 'map';
  readonly added: readonly Add<K, V>[];
  readonly removed: readonly Remove<K, V>[];
  readonly modified: readonly Modify<K, D>[];

  constructor(
    added: readonly Add<K, V>[],
    removed: readonly Remove<K, V>[],
    modified: readonly Modify<K, D>[]
  ) {
    this.added = Object.freeze(added);
    this.removed = Object.freeze(removed);
    this.modified = Object.freeze(modified);
  }

  isEmpty(): boolean {
    return (
      this.added.length === 0 &&
      this.removed.length === 0 &&
      this.modified.length === 0
    );
  }

  hasChanges(): boolean {
    return !this.isEmpty();
  }

  counts(): ChangeCounts {
    return {
      added: this.added.length,
      removed: this.removed.length,
      modified: this.modified.length
    };
  }

  additions(): Additions<K, V> {
    return new Additions(this.added.values());
  }

  removals(): Removals<K, V> {
    return new Removals(this.removed.values());
  }

  modifications(): Modifications<K, D> {
    return new Modifications(this.modified.values());
  }

  pureChanges(): PureChanges<K, V> {
    return new PureChanges(this.additions(), this.removals());
  }

  changes(): Changes<K, V, D> {
    return new Changes(this.additions(), this.removals(), this.modifications());
  }
}

/**
 * The result of diffing two sets.
 *
 * An element is its own key, so additions and removals carry the element as
 * both `key` and `value`. There is no modify case: `modifications()` is typed
 * `Modifications<T, never>` and is always empty.
 *
 * @template T - The element type.
 */
export class SetChangeset<T> implements ChangesetView<T, T, never> {
  readonly kind = 'set';
  readonly added: readonly T[];
  readonly removed: readonly T[];

  constructor(added: readonly T[], removed: readonly T[]) {
    this.added = Object.freeze(added);
    this.removed = Object.freeze(removed);
  }

  isEmpty(): boolean {
    return this.added.length === 0 && this.removed.length === 0;
  }

  hasChanges(): boolean {
    return !this.isEmpty();
  }

  counts(): ChangeCounts {
    return {
      added: this.added.length,
      removed: this.removed.length,
      modified: 0
    };
  }

  additions(): Additions<T, T> {
    return new Additions(
      mapIterable(this.added, element => createAdd(element, element))
    );
  }

  removals(): Removals<T, T> {
    return new Removals(
      mapIterable(this.removed, element => createRemove(element, element))
    );
  }

  modifications(): Modifications<T, never> {
    return Modifications.empty<T>();
  }

  pureChanges(): PureChanges<T, T> {
    return new PureChanges(this.additions(), this.removals());
  }

  changes(): Changes<T, T, never> {
    return new Changes(this.additions(), this.removals(), this.modifications());
  }
}

/**
 * Narrows an arbitrary diff result to one of the changeset classes.
 */
export function isChangeset(
  value: unknown
): value is Changeset<unknown, unknown, HasChanges> | SetChangeset<unknown> {
  return value instanceof Changeset || value instanceof SetChangeset;
}
