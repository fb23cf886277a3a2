import type { Change, HasChanges } from '../change/types';
import { Different } from '../change/modification';
import { SetChangeset, isChangeset } from '../changeset/changeset';
import type { ChangesetView } from '../changeset/changeset';
import { diffValues, isTraversable } from './value-diff';

export type ReportOptions = {
  /**
   * Prefix added per nesting level.
   * @default '  '
   */
  indent: string;

  /**
   * Renders keys. Defaults to the raw string for string keys and
   * {@link formatValue} otherwise.
   */
  formatKey: (key: unknown) => string;

  /**
   * Renders values. Defaults to {@link formatValue}.
   */
  formatValue: (value: unknown) => string;
};

type AnyChangeset = ChangesetView<unknown, unknown, HasChanges>;

/**
 * Renders a value on a single line.
 *
 * Strings are quoted, `Set`s render as `Set {a, b}`, `Map`s as
 * `Map {k => v}`, plain objects as `{key: value}`; cycles render as
 * `[Circular]`.
 */
export function formatValue(value: unknown): string {
  return renderValue(value, new Set());
}

function renderValue(value: unknown, seen: Set<object>): string {
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'bigint') return `${value}n`;
  if (typeof value === 'function') return '[Function]';
  if (typeof value !== 'object' || value === null) return String(value);

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
  }
  if (value instanceof RegExp) return value.toString();
  if (seen.has(value)) return '[Circular]';

  seen.add(value);
  try {
    if (Array.isArray(value)) {
      return `[${value.map(item => renderValue(item, seen)).join(', ')}]`;
    }
    if (value instanceof Set) {
      const items = Array.from(value, item => renderValue(item, seen));
      return `Set {${items.join(', ')}}`;
    }
    if (value instanceof Map) {
      const entries = Array.from(
        value,
        ([key, item]) => `${renderValue(key, seen)} => ${renderValue(item, seen)}`
      );
      return `Map {${entries.join(', ')}}`;
    }
    const entries = Object.entries(value).map(
      ([key, item]) => `${key}: ${renderValue(item, seen)}`
    );
    return `{${entries.join(', ')}}`;
  } finally {
    seen.delete(value);
  }
}

function defaultFormatKey(key: unknown): string {
  return typeof key === 'string' ? key : formatValue(key);
}

/**
 * Merges the provided partial options with the report defaults.
 */
export function normalizeReportOptions(
  options: Partial<ReportOptions>
): ReportOptions {
  return {
    indent: '  ',
    formatKey: defaultFormatKey,
    formatValue,
    ...options
  };
}

function renderModification(
  key: string,
  modification: HasChanges,
  prefix: string,
  options: ReportOptions
): string[] {
  // 1. Nested changeset: header line, then the nested report one level deeper.
  if (isChangeset(modification)) {
    return [
      `${prefix}~ ${key}`,
      ...renderChangeset(modification, prefix + options.indent, options)
    ];
  }

  // 2. Leaf difference between two containers: one line per differing path.
  if (
    modification instanceof Different &&
    isTraversable(modification.source) &&
    isTraversable(modification.target)
  ) {
    const lines = diffValues(modification.source, modification.target).map(
      ({ path, left, right }) =>
        `${prefix}${options.indent}${path.join('.')}: ${options.formatValue(left)} -> ${options.formatValue(right)}`
    );
    return [`${prefix}~ ${key}`, ...lines];
  }

  // 3. Leaf difference between scalars (or opaque values).
  if (modification instanceof Different) {
    return [
      `${prefix}~ ${key}: ${options.formatValue(modification.source)} -> ${options.formatValue(modification.target)}`
    ];
  }

  // 4. Caller-defined result type: only the key is known to be modified.
  return [`${prefix}~ ${key}`];
}

function renderChange(
  change: Change<unknown, unknown, HasChanges>,
  isSet: boolean,
  prefix: string,
  options: ReportOptions
): string[] {
  switch (change.type) {
    case 'ADD':
      return [
        isSet
          ? `${prefix}+ ${options.formatValue(change.value)}`
          : `${prefix}+ ${options.formatKey(change.key)}: ${options.formatValue(change.value)}`
      ];
    case 'REMOVE':
      return [
        isSet
          ? `${prefix}- ${options.formatValue(change.value)}`
          : `${prefix}- ${options.formatKey(change.key)}: ${options.formatValue(change.value)}`
      ];
    case 'MODIFY':
      return renderModification(
        options.formatKey(change.key),
        change.modification,
        prefix,
        options
      );
  }
}

function renderChangeset(
  changeset: AnyChangeset,
  prefix: string,
  options: ReportOptions
): string[] {
  const isSet = changeset instanceof SetChangeset;
  const lines: string[] = [];

  for (const change of changeset.changes()) {
    lines.push(...renderChange(change, isSet, prefix, options));
  }
  return lines;
}

/**
 * Renders a changeset as a human-readable change log.
 *
 * Line grammar (additions first, then removals, then modifications, at every
 * nesting level):
 * - `+ key: value` / `- key: value` (sets: `+ element` / `- element`)
 * - `~ key` followed by indented nested lines, for nested changesets and for
 *   leaf differences between two objects or arrays (`path: left -> right`)
 * - `~ key: left -> right` for other leaf differences
 *
 * @returns The report, one change per line; an empty string for an empty
 *   changeset.
 */
export function formatChangeset(
  changeset: AnyChangeset,
  options: Partial<ReportOptions> = {}
): string {
  return renderChangeset(changeset, '', normalizeReportOptions(options)).join(
    '\n'
  );
}

/**
 * One-line bucket summary, e.g. `"added=1, removed=0, modified=2"`.
 */
export function summarizeChangeset(changeset: AnyChangeset): string {
  const { added, removed, modified } = changeset.counts();
  return `added=${added}, removed=${removed}, modified=${modified}`;
}
