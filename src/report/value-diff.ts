import { diff } from 'object-graph-delta';

import { isRichType, isStructurallyEqual } from '../utils/equality';

/**
 * A key path from the compared root to a differing value
 * (strings for object keys, numbers for array indices).
 */
export type ValuePath = (string | number)[];

/**
 * A single leaf-level difference between two JSON-like values.
 *
 * A side on which the path does not exist reads as `null`.
 */
export type ValueDiff = {
  path: ValuePath;
  left: unknown;
  right: unknown;
};

type JsonContainer = Record<string, unknown> | unknown[];

function isPlainRecord(value: object): value is Record<string, unknown> {
  const prototype = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

/**
 * Whether a value is an array or a plain object, the containers
 * `diffValues` descends into.
 */
export function isTraversable(value: unknown): value is JsonContainer {
  if (typeof value !== 'object' || value === null) return false;
  return Array.isArray(value) || isPlainRecord(value);
}

/**
 * Whether every node below `value` is a primitive, a rich type (Date,
 * RegExp, boxed primitive) or another traversable container.
 *
 * `Map`, `Set` and class instances have no own enumerable entries to walk,
 * so a tree holding one is compared whole. Back-references on the current
 * path are accepted; the differ guards them.
 */
function isJsonTree(value: unknown, path: Set<object>): boolean {
  if (typeof value !== 'object' || value === null) return true;
  if (isRichType(value) || path.has(value)) return true;
  if (!isTraversable(value)) return false;

  path.add(value);
  try {
    return Object.values(value).every(item => isJsonTree(item, path));
  } finally {
    path.delete(value);
  }
}

function hasSameContainerKind(left: JsonContainer, right: JsonContainer): boolean {
  return Array.isArray(left) === Array.isArray(right);
}

/**
 * Path-annotated differences between two JSON-like values, for change
 * reports.
 *
 * Logic:
 * 1. Two containers of the same kind whose trees are JSON-like are handed to
 *    `object-graph-delta` with index-level array diffing and cycle tracking.
 *    Its results map onto sides:
 *    - `CHANGE`: `oldValue` left, `value` right.
 *    - `REMOVE`: the removed value left, `null` right.
 *    - `CREATE`: `null` left, the created value right.
 * 2. Anything else is one difference at the empty path unless the values are
 *    structurally equal.
 *
 * Results follow the differ's order: removals and changes in left key
 * order, then creations in right key order.
 */
export function diffValues(left: unknown, right: unknown): ValueDiff[] {
  if (
    isTraversable(left) &&
    isTraversable(right) &&
    hasSameContainerKind(left, right) &&
    isJsonTree(left, new Set()) &&
    isJsonTree(right, new Set())
  ) {
    const differences = diff<unknown>(left, right, {
      arrays: 'diff',
      trackCircularReferences: true
    });

    return differences.map(difference => {
      switch (difference.type) {
        case 'CHANGE':
          return {
            path: difference.path,
            left: difference.oldValue,
            right: difference.value
          };
        case 'REMOVE':
          return { path: difference.path, left: difference.oldValue, right: null };
        case 'CREATE':
          return { path: difference.path, left: null, right: difference.value };
      }
    });
  }

  return isStructurallyEqual(left, right) ? [] : [{ path: [], left, right }];
}
