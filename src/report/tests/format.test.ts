import { describe, expect, test } from 'vitest';

import type { TestScenario } from '../../tests/types';
import { resolveScenarioInput } from '../../tests/test-utils';
import { diffMaps, diffRecords } from '../../collections/map';
import { diffSets } from '../../collections/set';
import { mapOfSets } from '../../collections/tests/helpers';
import { defineStrategy, mapValues, setValues } from '../../strategies/presets';
import { formatChangeset, formatValue, summarizeChangeset } from '../format';

function buildCycle(): unknown {
  const node: Record<string, unknown> = {};
  node.self = node;
  return node;
}

function buildSharedReference(): unknown {
  const shared = {};
  return { x: shared, y: shared };
}

/**
 * Change reports.
 * Focus: single-line values, line grammar per change kind, nesting, summaries.
 */
describe('Change reports: value rendering, line grammar, nesting, summaries.', () => {
  describe('formatValue', () => {
    const scenarios: Array<TestScenario<unknown, string>> = [
      { id: 'String', description: 'Strings are quoted.', input: 'x', expected: '"x"' },
      { id: 'Number', description: 'Numbers render as is.', input: 42, expected: '42' },
      { id: 'BigInt', description: 'BigInts carry the n suffix.', input: 1n, expected: '1n' },
      { id: 'Null', description: 'null renders as null.', input: null, expected: 'null' },
      {
        id: 'Date',
        description: 'Dates render in ISO form.',
        input: new Date(0),
        expected: '1970-01-01T00:00:00.000Z'
      },
      {
        id: 'Invalid Date',
        description: 'A date without a timestamp renders as Invalid Date.',
        input: new Date(NaN),
        expected: 'Invalid Date'
      },
      {
        id: 'RegExp',
        description: 'Regular expressions render as literals.',
        input: /a+/g,
        expected: '/a+/g'
      },
      {
        id: 'Array',
        description: 'Arrays render their items.',
        input: [1, 'b', [true]],
        expected: '[1, "b", [true]]'
      },
      {
        id: 'Set',
        description: 'Sets render with a Set prefix.',
        input: new Set([1, 2]),
        expected: 'Set {1, 2}'
      },
      {
        id: 'Map',
        description: 'Maps render key => value pairs.',
        input: new Map([['k', 1]]),
        expected: 'Map {"k" => 1}'
      },
      {
        id: 'Object',
        description: 'Plain objects render unquoted keys.',
        input: { a: 1, b: { c: 'd' } },
        expected: '{a: 1, b: {c: "d"}}'
      },
      {
        id: 'Cycle',
        description: 'A back-reference renders as [Circular].',
        input: buildCycle,
        expected: '{self: [Circular]}'
      },
      {
        id: 'Shared Reference',
        description: 'A reference seen twice without a cycle renders twice.',
        input: buildSharedReference,
        expected: '{x: {}, y: {}}'
      }
    ];

    test.for(scenarios)('[$id] $description', ({ input, expected }) => {
      expect(formatValue(resolveScenarioInput(input))).toBe(expected);
    });

    test('[Function] functions render as a placeholder', () => {
      expect(formatValue(() => 1)).toBe('[Function]');
    });
  });

  describe('formatChangeset', () => {
    test('[Flat Map] additions, removals, then modifications', () => {
      const changeset = diffMaps(
        new Map([
          ['a', 1],
          ['b', 2],
          ['c', 3]
        ]),
        new Map([
          ['b', 2],
          ['c', 4],
          ['d', 5]
        ])
      );

      expect(formatChangeset(changeset)).toBe('+ d: 5\n- a: 1\n~ c: 3 -> 4');
    });

    test('[Set] set lines carry the element only', () => {
      const changeset = diffSets(new Set([1, 2, 3]), new Set([2, 3, 4]));

      expect(formatChangeset(changeset)).toBe('+ 4\n- 1');
    });

    test('[Non-String Keys] keys are rendered with formatValue', () => {
      const changeset = diffMaps(new Map([[1, 'a']]), new Map([[1, 'b']]));

      expect(formatChangeset(changeset)).toBe('~ 1: "a" -> "b"');
    });

    test('[Nested Set] a nested changeset is indented under its key', () => {
      const changeset = diffMaps(
        mapOfSets([['team', ['x', 'y']]]),
        mapOfSets([['team', ['y', 'z']]]),
        setValues<string>()
      );

      expect(formatChangeset(changeset)).toBe('~ team\n  + "z"\n  - "x"');
    });

    test('[Deep Nesting] every level adds one indent', () => {
      const changeset = diffMaps(
        new Map([
          [2, mapOfSets([[1, [1, 2, 3]]])],
          [3, mapOfSets([[1, [1, 2, 3]]])]
        ]),
        new Map([
          [2, mapOfSets([[2, [1, 2, 3]]])],
          [3, mapOfSets([[1, [1, 2]]])]
        ]),
        mapValues(setValues<number>())
      );

      expect(formatChangeset(changeset).split('\n')).toStrictEqual([
        '~ 2',
        '  + 2: Set {1, 2, 3}',
        '  - 1: Set {1, 2, 3}',
        '~ 3',
        '  ~ 1',
        '    - 3'
      ]);
    });

    test('[Object Leaf] a leaf diff between objects expands per path', () => {
      const changeset = diffRecords(
        { server: { port: 80, host: 'a', tls: { on: false } } },
        { server: { port: 81, host: 'a', tls: { on: true } } }
      );

      expect(formatChangeset(changeset)).toBe(
        '~ server\n  port: 80 -> 81\n  tls.on: false -> true'
      );
    });

    test('[Cyclic Records] a leaf diff between cyclic objects terminates', () => {
      const before: Record<string, unknown> = { v: 1 };
      before.self = before;
      const after: Record<string, unknown> = { v: 2 };
      after.self = after;

      const changeset = diffRecords({ node: before }, { node: after });

      expect(formatChangeset(changeset).split('\n')).toStrictEqual([
        '~ node',
        '  v: 1 -> 2',
        '  self.v: 1 -> 2'
      ]);
    });

    test('[Invalid Date] an added invalid date is rendered, not thrown', () => {
      const changeset = diffMaps(new Map(), new Map([['d', new Date(NaN)]]));

      expect(formatChangeset(changeset)).toBe('+ d: Invalid Date');
    });

    test('[Custom Result] an unknown result type reports the key only', () => {
      const changeset = diffMaps(
        new Map([['k', 'v1']]),
        new Map([['k', 'v2']]),
        defineStrategy('opaque', () => ({ hasChanges: () => true }))
      );

      expect(formatChangeset(changeset)).toBe('~ k');
    });

    test('[Options] indent, key and value renderers are configurable', () => {
      const changeset = diffMaps(
        mapOfSets([['team', ['x']]]),
        mapOfSets([['team', ['y']]]),
        setValues<string>()
      );

      expect(
        formatChangeset(changeset, {
          indent: '    ',
          formatKey: key => `<${String(key)}>`,
          formatValue: value => String(value).toUpperCase()
        })
      ).toBe('~ <team>\n    + Y\n    - X');
    });

    test('[Empty] an empty changeset renders as an empty string', () => {
      expect(formatChangeset(diffSets(new Set([1]), new Set([1])))).toBe('');
    });
  });

  test('[Summary] bucket sizes on one line', () => {
    const changeset = diffMaps(
      new Map([
        ['a', 1],
        ['c', 3]
      ]),
      new Map([
        ['c', 4],
        ['d', 5]
      ])
    );

    expect(summarizeChangeset(changeset)).toBe('added=1, removed=1, modified=1');
  });
});
