import type {
  Add,
  Change,
  HasChanges,
  Modify,
  PureChange,
  Remove
} from '../change/types';

/**
 * Iterator wrapper that stays exhausted.
 *
 * Logic:
 * 1. Delegation:
 *    Forwards `next()` to the wrapped iterator while it still yields values.
 * 2. Release:
 *    The first `done` result drops the reference to the wrapped iterator.
 * 3. Stability:
 *    Every later `next()` call answers `done` without touching the wrapped
 *    iterator again, so a source that would restart (or throw) after
 *    completion is never resurrected.
 *
 * @template T - The element type.
 */
class FusedIterator<T> implements IterableIterator<T> {
  private source: Iterator<T> | undefined;

  constructor(source: Iterator<T>) {
    this.source = source;
  }

  next(): IteratorResult<T, undefined> {
    if (this.source === undefined) return { done: true, value: undefined };

    const result = this.source.next();
    if (result.done) {
      this.source = undefined;
      return { done: true, value: undefined };
    }

    return { done: false, value: result.value };
  }

  [Symbol.iterator](): this {
    return this;
  }

  /**
   * Drains the remaining elements into an array.
   * Calling it again after exhaustion returns an empty array.
   */
  toArray(): T[] {
    return Array.from(this);
  }
}

/**
 * The additions needed to turn the source collection into the target.
 */
export class Additions<K, V> extends FusedIterator<Add<K, V>> {}

/**
 * The removals needed to turn the source collection into the target.
 */
export class Removals<K, V> extends FusedIterator<Remove<K, V>> {}

/**
 * The modifications needed to turn the source collection into the target.
 */
export class Modifications<K, D extends HasChanges> extends FusedIterator<
  Modify<K, D>
> {
  /**
   * A sequence that is empty by construction.
   *
   * Used by collections that have no modify case at all (sets): the `never`
   * payload makes it impossible to produce a `Modify` through this type.
   */
  static empty<K>(): Modifications<K, never> {
    const nothing: Modify<K, never>[] = [];
    return new Modifications<K, never>(nothing.values());
  }
}

/**
 * Additions followed by removals.
 *
 * For consumers that only care about presence changes and not about the
 * content of values present on both sides.
 */
export class PureChanges<K, V> implements IterableIterator<PureChange<K, V>> {
  constructor(
    private readonly additions: Additions<K, V>,
    private readonly removals: Removals<K, V>
  ) {}

  next(): IteratorResult<PureChange<K, V>, undefined> {
    const addition = this.additions.next();
    if (!addition.done) return { done: false, value: addition.value };

    const removal = this.removals.next();
    if (!removal.done) return { done: false, value: removal.value };

    return { done: true, value: undefined };
  }

  [Symbol.iterator](): this {
    return this;
  }

  toArray(): PureChange<K, V>[] {
    return Array.from(this);
  }
}

/**
 * Every change, in a fixed order: additions, then removals, then
 * modifications.
 *
 * The order is part of the contract. Change-log renderers report presence
 * changes before nested content changes and rely on it.
 */
export class Changes<K, V, D extends HasChanges>
  implements IterableIterator<Change<K, V, D>>
{
  private readonly pureChanges: PureChanges<K, V>;

  constructor(
    additions: Additions<K, V>,
    removals: Removals<K, V>,
    private readonly modifications: Modifications<K, D>
  ) {
    this.pureChanges = new PureChanges(additions, removals);
  }

  next(): IteratorResult<Change<K, V, D>, undefined> {
    const pure = this.pureChanges.next();
    if (!pure.done) return { done: false, value: pure.value };

    const modification = this.modifications.next();
    if (!modification.done) return { done: false, value: modification.value };

    return { done: true, value: undefined };
  }

  [Symbol.iterator](): this {
    return this;
  }

  toArray(): Change<K, V, D>[] {
    return Array.from(this);
  }
}

/**
 * Lazily projects every element of `source` through `project`.
 *
 * @param source - The iterable to read from.
 * @param project - The projection applied per element.
 */
export function* mapIterable<T, U>(
  source: Iterable<T>,
  project: (value: T) => U
): Generator<U, void, undefined> {
  for (const value of source) {
    yield project(value);
  }
}
