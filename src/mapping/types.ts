/**
 * One source of items for an extracted entry.
 */
export type ExtractGroup = {
  /**
   * Name of the existing entry the items are copied from.
   */
  from: string;
  /**
   * Target index (as a string key, the way JSON objects carry it) to source
   * index within `from`.
   */
  indices: Readonly<Record<string, number>>;
};

/**
 * Builds a new entry out of items picked from existing entries.
 */
export type ExtractOperation = {
  /**
   * Number of items in the new entry. Every index below it must be filled.
   */
  count: number;
  groups: readonly ExtractGroup[];
};

/**
 * Key-space normalization applied to a dataset before it is diffed against a
 * dataset from another source.
 *
 * Applied in a fixed order: `extract`, `rename`, `merge`, `ignore`.
 */
export type MappingOperations = {
  /**
   * New entry name to the operation building it.
   */
  extract: Readonly<Record<string, ExtractOperation>>;
  /**
   * Existing name to new name.
   */
  rename: Readonly<Record<string, string>>;
  /**
   * Entry name to the entry its items are appended to. The merged entry is
   * dropped.
   */
  merge: Readonly<Record<string, string>>;
  /**
   * Entry names to drop.
   */
  ignore: readonly string[];
};

/**
 * Two datasets partitioned by entry name.
 */
export type AlignedDatasets<L, R> = {
  /**
   * Entries present in both datasets, in ascending name order.
   */
  shared: Map<string, readonly [left: L, right: R]>;
  /**
   * Names present only in the left dataset, ascending.
   */
  leftOnly: string[];
  /**
   * Names present only in the right dataset, ascending.
   */
  rightOnly: string[];
};
