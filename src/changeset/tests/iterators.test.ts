import { describe, expect, test } from 'vitest';

import type { Add } from '../../change/types';
import { createAdd } from '../../change/factories';
import { Different } from '../../change/modification';
import { diffMaps } from '../../collections/map';
import { Additions, Modifications, mapIterable } from '../iterators';

/**
 * Lazy output adapters.
 * Focus: fused exhaustion, independent accessors, fixed change order.
 */
describe('Iterators: fused exhaustion, independent accessors, fixed change order.', () => {
  const changeset = diffMaps(
    new Map([
      ['keep', 1],
      ['drop', 2],
      ['edit', 3]
    ]),
    new Map([
      ['keep', 1],
      ['edit', 4],
      ['new', 5]
    ])
  );

  test('[Fused] an exhausted iterator keeps answering done', () => {
    const additions = changeset.additions();

    expect(additions.next()).toStrictEqual({
      done: false,
      value: { type: 'ADD', key: 'new', value: 5 }
    });
    expect(additions.next()).toStrictEqual({ done: true, value: undefined });
    expect(additions.next()).toStrictEqual({ done: true, value: undefined });
    expect(additions.toArray()).toStrictEqual([]);
  });

  test('[Fused Source] a source that restarts after completion is not resumed', () => {
    let calls = 0;
    const restarting: Iterator<Add<number, number>> = {
      next() {
        calls += 1;
        return calls === 2
          ? { done: true, value: undefined }
          : { done: false, value: createAdd(calls, calls) };
      }
    };
    const fused = new Additions(restarting);

    expect(fused.toArray()).toStrictEqual([{ type: 'ADD', key: 1, value: 1 }]);
    expect(fused.next()).toStrictEqual({ done: true, value: undefined });
    expect(calls).toBe(2);
  });

  test('[Independent] every accessor call starts a fresh sequence', () => {
    expect(changeset.removals().toArray()).toStrictEqual([
      { type: 'REMOVE', key: 'drop', value: 2 }
    ]);
    expect(changeset.removals().toArray()).toStrictEqual([
      { type: 'REMOVE', key: 'drop', value: 2 }
    ]);
  });

  test('[Order] changes yields additions, removals, then modifications', () => {
    expect(Array.from(changeset.changes(), change => change.type)).toStrictEqual([
      'ADD',
      'REMOVE',
      'MODIFY'
    ]);
    expect(changeset.modifications().toArray()).toStrictEqual([
      { type: 'MODIFY', key: 'edit', modification: new Different(3, 4) }
    ]);
  });

  test('[Pure Changes] pureChanges omits modifications', () => {
    expect(changeset.pureChanges().toArray()).toStrictEqual([
      { type: 'ADD', key: 'new', value: 5 },
      { type: 'REMOVE', key: 'drop', value: 2 }
    ]);
  });

  test('[Iterable] adapters work with for...of and spread', () => {
    const keys: string[] = [];
    for (const change of changeset.changes()) {
      keys.push(change.key);
    }

    expect(keys).toStrictEqual(['new', 'drop', 'edit']);
    expect([...changeset.additions()]).toHaveLength(1);
  });

  test('[Empty] Modifications.empty yields nothing', () => {
    const empty = Modifications.empty<string>();

    expect(empty.next()).toStrictEqual({ done: true, value: undefined });
    expect(empty.toArray()).toStrictEqual([]);
  });

  test('[Lazy Projection] mapIterable projects on demand', () => {
    const seen: number[] = [];
    const projected = mapIterable([1, 2, 3], value => {
      seen.push(value);
      return value * 10;
    });

    expect(projected.next()).toStrictEqual({ done: false, value: 10 });
    expect(seen).toStrictEqual([1]);
    expect([...projected]).toStrictEqual([20, 30]);
  });
});
