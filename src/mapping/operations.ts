import { MappingError } from '../errors';
import type { ExtractOperation, MappingOperations } from './types';

/**
 * Merges the provided partial operations with empty defaults.
 */
export function normalizeMappingOperations(
  operations: Partial<MappingOperations>
): MappingOperations {
  return {
    extract: {},
    rename: {},
    merge: {},
    ignore: [],
    ...operations
  };
}

function parseIndex(raw: string | number, bound: number): number | undefined {
  const index = typeof raw === 'number' ? raw : Number(raw);
  return Number.isInteger(index) && index >= 0 && index < bound
    ? index
    : undefined;
}

function extractEntry<T>(
  dataset: ReadonlyMap<string, T[]>,
  name: string,
  operation: ExtractOperation
): T[] {
  const slots: ({ value: T } | undefined)[] = Array.from(
    { length: operation.count },
    () => undefined
  );

  for (const group of operation.groups) {
    const origin = dataset.get(group.from);
    if (!origin) {
      throw new MappingError(
        `Cannot extract "${name}": source entry "${group.from}" does not exist in this dataset.`
      );
    }

    for (const [rawTarget, rawSource] of Object.entries(group.indices)) {
      const targetIndex = parseIndex(rawTarget, operation.count);
      if (targetIndex === undefined) {
        throw new MappingError(
          `Cannot extract "${name}": target index "${rawTarget}" is outside 0..${operation.count - 1}.`
        );
      }

      const sourceIndex = parseIndex(rawSource, origin.length);
      if (sourceIndex === undefined) {
        throw new MappingError(
          `Cannot extract "${name}": source index ${rawSource} does not exist in "${group.from}" (${origin.length} items).`
        );
      }

      slots[targetIndex] = { value: origin[sourceIndex] };
    }
  }

  return slots.map((slot, index) => {
    if (!slot) {
      throw new MappingError(
        `Cannot extract "${name}": item at index ${index} was not filled.`
      );
    }
    return slot.value;
  });
}

/**
 * Normalizes the key space of a dataset of named entries (each a list of
 * items) so it can be diffed against a dataset from another source.
 *
 * Steps, in order:
 * 1. extract: builds each new entry from items of existing entries.
 * 2. rename: moves an entry to a new name (replacing any entry there).
 * 3. merge: appends an entry's items to another entry and drops it.
 * 4. ignore: drops entries.
 *
 * The input is not mutated; entries are copied before any step runs.
 *
 * @throws {MappingError} When an operation refers to an entry that does not
 *   exist, extracts into an existing name, or leaves an extracted item unset.
 */
export function applyMappingOperations<T>(
  dataset: ReadonlyMap<string, readonly T[]>,
  operations: Partial<MappingOperations>
): Map<string, T[]> {
  const { extract, rename, merge, ignore } =
    normalizeMappingOperations(operations);
  const current = new Map<string, T[]>(
    Array.from(dataset, ([name, items]): [string, T[]] => [name, [...items]])
  );

  // 1. Extract
  for (const [name, operation] of Object.entries(extract)) {
    if (current.has(name)) {
      throw new MappingError(
        `Cannot extract "${name}": the dataset already has an entry with that name.`
      );
    }
    current.set(name, extractEntry(current, name, operation));
  }

  // 2. Rename
  for (const [from, to] of Object.entries(rename)) {
    const moving = current.get(from);
    if (!moving) {
      throw new MappingError(
        `Cannot rename "${from}" to "${to}": "${from}" does not exist in the dataset.`
      );
    }
    current.delete(from);
    current.set(to, moving);
  }

  // 3. Merge
  for (const [from, into] of Object.entries(merge)) {
    const moving = current.get(from);
    if (!moving) {
      throw new MappingError(
        `Cannot merge "${from}" into "${into}": "${from}" does not exist in the dataset.`
      );
    }
    // The source leaves before the target is looked up, so an entry never
    // merges into itself.
    current.delete(from);
    const destination = current.get(into);
    if (!destination) {
      throw new MappingError(
        `Cannot merge "${from}" into "${into}": "${into}" does not exist in the dataset.`
      );
    }
    destination.push(...moving);
  }

  // 4. Ignore
  for (const name of ignore) {
    if (!current.delete(name)) {
      throw new MappingError(
        `Cannot ignore "${name}": it does not exist in the dataset.`
      );
    }
  }

  return current;
}
