/**
 * Internal tag strings for "rich" built-in types that are compared as atomic
 * values rather than traversed.
 *
 * Uses the tags returned by `Object.prototype.toString` instead of
 * `constructor.name`, which minifiers rename and callers can overwrite.
 */
const Tag = {
  String: '[object String]',
  Number: '[object Number]',
  Boolean: '[object Boolean]',
  BigInt: '[object BigInt]',
  Date: '[object Date]',
  RegExp: '[object RegExp]'
} as const;

const RICH_TYPES = new Set<string>([
  Tag.String,
  Tag.Number,
  Tag.Boolean,
  Tag.BigInt,
  Tag.Date,
  Tag.RegExp
]);

/**
 * A pair of objects currently being compared on the active recursion path.
 */
type ComparisonEntry = readonly [left: object, right: object];

function tagOf(value: object): string {
  return Object.prototype.toString.call(value);
}

/**
 * Determines if a value is a "rich" built-in type
 * (Date, RegExp or a boxed String, Number, Boolean, BigInt).
 */
export function isRichType(value: object): boolean {
  return RICH_TYPES.has(tagOf(value));
}

/**
 * Extracts the primitive from a wrapper object.
 * The caller guarantees the wrapper implements `.valueOf()`.
 */
function unbox<T>(wrapper: object): T {
  return (wrapper as { valueOf(): T }).valueOf();
}

/**
 * Compares two rich-type objects by content.
 *
 * - Boxed primitives: by unboxed value (`NaN` equals `NaN`).
 * - `Date`: by timestamp.
 * - `RegExp`: by source and flags.
 *
 * @returns `true` if both objects carry the same tag and value.
 */
export function areRichValuesEqual(left: object, right: object): boolean {
  const leftTag = tagOf(left);
  if (leftTag !== tagOf(right)) return false;

  switch (leftTag) {
    case Tag.Number:
    case Tag.Date: {
      const leftValue = unbox<number>(left);
      const rightValue = unbox<number>(right);
      if (Number.isNaN(leftValue)) return Number.isNaN(rightValue);
      return leftValue === rightValue;
    }
    case Tag.String:
      return unbox<string>(left) === unbox<string>(right);
    case Tag.Boolean:
      return unbox<boolean>(left) === unbox<boolean>(right);
    case Tag.BigInt:
      return unbox<bigint>(left) === unbox<bigint>(right);
    case Tag.RegExp:
      return left.toString() === right.toString();
    default:
      return false;
  }
}

function isObjectLike(value: unknown): value is object {
  return typeof value === 'object' && value !== null;
}

function isRecord(value: object): value is Record<string, unknown> {
  return !Array.isArray(value);
}

function isCycleDetected(
  stack: readonly ComparisonEntry[],
  left: object,
  right: object
): boolean {
  for (const [seenLeft, seenRight] of stack) {
    if (seenLeft === left && seenRight === right) return true;
  }
  return false;
}

function areArraysEqual(
  left: readonly unknown[],
  right: readonly unknown[],
  stack: readonly ComparisonEntry[]
): boolean {
  if (left.length !== right.length) return false;
  return left.every((value, index) => compareValues(value, right[index], stack));
}

function areMapsEqual(
  left: ReadonlyMap<unknown, unknown>,
  right: ReadonlyMap<unknown, unknown>,
  stack: readonly ComparisonEntry[]
): boolean {
  if (left.size !== right.size) return false;

  for (const [key, value] of left) {
    if (!right.has(key)) return false;
    if (!compareValues(value, right.get(key), stack)) return false;
  }
  return true;
}

function areSetsEqual(
  left: ReadonlySet<unknown>,
  right: ReadonlySet<unknown>,
  stack: readonly ComparisonEntry[]
): boolean {
  if (left.size !== right.size) return false;

  // Right-hand objects already paired with a left element. An object held by
  // both sets pairs with itself, so it is never a structural candidate.
  const matched = new Set<object>();

  for (const element of left) {
    if (right.has(element)) continue;

    // Object elements are members by reference; fall back to a structural
    // search so two sets of equal records compare equal.
    if (!isObjectLike(element)) return false;

    let found = false;
    for (const candidate of right) {
      if (
        isObjectLike(candidate) &&
        !matched.has(candidate) &&
        !left.has(candidate) &&
        compareValues(element, candidate, stack)
      ) {
        matched.add(candidate);
        found = true;
        break;
      }
    }
    if (!found) return false;
  }
  return true;
}

function areRecordsEqual(
  left: Record<string, unknown>,
  right: Record<string, unknown>,
  stack: readonly ComparisonEntry[]
): boolean {
  const leftKeys = Object.keys(left);
  if (leftKeys.length !== Object.keys(right).length) return false;

  return leftKeys.every(
    key =>
      Object.prototype.hasOwnProperty.call(right, key) &&
      compareValues(left[key], right[key], stack)
  );
}

function compareValues(
  left: unknown,
  right: unknown,
  stack: readonly ComparisonEntry[]
): boolean {
  if (Object.is(left, right)) return true;
  if (!isObjectLike(left) || !isObjectLike(right)) return false;

  if (tagOf(left) !== tagOf(right)) return false;
  if (isRichType(left)) return areRichValuesEqual(left, right);

  // A pair already on the current path is a back-edge; treat it as equal so
  // the comparison terminates.
  if (isCycleDetected(stack, left, right)) return true;
  const nextStack = stack.concat([[left, right]]);

  if (Array.isArray(left) || Array.isArray(right)) {
    return (
      Array.isArray(left) &&
      Array.isArray(right) &&
      areArraysEqual(left, right, nextStack)
    );
  }
  if (left instanceof Map && right instanceof Map) {
    return areMapsEqual(left, right, nextStack);
  }
  if (left instanceof Set && right instanceof Set) {
    return areSetsEqual(left, right, nextStack);
  }
  if (Object.getPrototypeOf(left) !== Object.getPrototypeOf(right)) {
    return false;
  }
  if (isRecord(left) && isRecord(right)) {
    return areRecordsEqual(left, right, nextStack);
  }
  return false;
}

/**
 * Deep structural equality used by the `simple` strategy by default.
 *
 * Rules:
 * 1. Identity: `Object.is` (so `NaN` equals `NaN` and `+0` differs from `-0`).
 * 2. Rich types: Date, RegExp and boxed primitives compare by value.
 * 3. Arrays: same length, pairwise equal.
 * 4. `Map`: same size, same keys (SameValueZero), equal values.
 * 5. `Set`: same size, every element of `left` is a member of `right`
 *    (object elements may match structurally, each right-hand object at
 *    most once).
 * 6. Other objects: same prototype, same own enumerable string keys, equal
 *    values.
 *
 * Cycles are guarded by a path-scoped stack of compared pairs.
 */
export function isStructurallyEqual(left: unknown, right: unknown): boolean {
  return compareValues(left, right, []);
}
