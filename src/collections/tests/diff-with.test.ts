import { describe, expect, test } from 'vitest';

import { Different } from '../../change/modification';
import { Changeset, SetChangeset } from '../../changeset/changeset';
import { setValues, simple } from '../../strategies/presets';
import { diffWith } from '../diff-with';

/**
 * Unified entry point.
 * Focus: dispatch per collection kind, strategy/options disambiguation, errors.
 */
describe('diffWith: dispatch per collection kind and argument validation.', () => {
  test('[Sets] two sets produce a set changeset', () => {
    const changeset = diffWith(new Set([1, 2]), new Set([2, 3]));

    expect(changeset).toBeInstanceOf(SetChangeset);
    expect(changeset.added).toStrictEqual([3]);
    expect(changeset.removed).toStrictEqual([1]);
  });

  test('[Sets With Options] options are forwarded to the set differ', () => {
    const changeset = diffWith(new Set<number>(), new Set([3, 1, 2]), {
      order: 'sorted'
    });

    expect(changeset.added).toStrictEqual([1, 2, 3]);
  });

  test('[Maps] two maps default to leaf comparison', () => {
    const changeset = diffWith(new Map([['k', 1]]), new Map([['k', 2]]));

    expect(changeset).toBeInstanceOf(Changeset);
    expect(changeset.modified).toStrictEqual([
      { type: 'MODIFY', key: 'k', modification: new Different(1, 2) }
    ]);
  });

  test('[Maps With Strategy] the strategy decides the modification type', () => {
    const changeset = diffWith(
      new Map([['k', new Set(['a'])]]),
      new Map([['k', new Set(['b'])]]),
      setValues<string>()
    );

    expect(changeset.modified).toStrictEqual([
      { type: 'MODIFY', key: 'k', modification: new SetChangeset(['b'], ['a']) }
    ]);
  });

  test('[Maps With Options] options alone are not mistaken for a strategy', () => {
    const changeset = diffWith(
      new Map([
        ['b', 1],
        ['a', 1]
      ]),
      new Map<string, number>(),
      { order: 'sorted' }
    );

    expect(changeset.removed.map(change => change.key)).toStrictEqual([
      'a',
      'b'
    ]);
  });

  test('[Records] two plain objects are diffed by key', () => {
    const changeset = diffWith({ x: 1, y: 2 }, { x: 1, y: 3 }, simple<number>());

    expect(changeset.changes().toArray()).toStrictEqual([
      { type: 'MODIFY', key: 'y', modification: new Different(2, 3) }
    ]);
  });

  test('[Null Prototype] objects without a prototype count as plain objects', () => {
    const source: Record<string, number> = Object.create(null);
    source.a = 1;

    const changeset = diffWith(source, {});

    expect(changeset.removed).toStrictEqual([
      { type: 'REMOVE', key: 'a', value: 1 }
    ]);
  });

  test('[Mismatched Kinds] a set and a map are rejected', () => {
    expect(() =>
      Reflect.apply(diffWith, undefined, [new Set([1]), new Map()])
    ).toThrow(
      new TypeError(
        'diffWith: expected two Sets, two Maps or two plain objects, received Set and Map.'
      )
    );
  });

  test('[Unsupported Kind] class instances are not plain objects', () => {
    expect(() =>
      Reflect.apply(diffWith, undefined, [{}, new Date(0)])
    ).toThrow(
      new TypeError(
        'diffWith: expected two Sets, two Maps or two plain objects, received plain object and [object Date].'
      )
    );
  });

  test('[Set Strategy] sets take no value strategy', () => {
    expect(() =>
      Reflect.apply(diffWith, undefined, [new Set(), new Set(), simple()])
    ).toThrow(
      new TypeError(
        'diffWith: sets are compared by membership only and take no value strategy.'
      )
    );
  });
});
