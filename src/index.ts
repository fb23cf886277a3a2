export type {
  Add,
  Change,
  HasChanges,
  Modification,
  Modify,
  PureChange,
  Remove
} from './change';
export {
  Different,
  Equal,
  createAdd,
  createModify,
  createRemove,
  isModification
} from './change';

export { Changeset, SetChangeset, isChangeset } from './changeset/changeset';
export type { ChangeCounts, ChangesetView } from './changeset/changeset';
export {
  Additions,
  Changes,
  Modifications,
  PureChanges,
  Removals
} from './changeset/iterators';

export { diffMaps, diffRecords } from './collections/map';
export { diffSets } from './collections/set';
export { diffWith } from './collections/diff-with';

export {
  arbitrarily,
  arbitrary,
  defineStrategy,
  describeShape,
  mapValues,
  recordValues,
  setValues,
  simple,
  simply
} from './strategies/presets';
export type {
  ArbitraryChangeset,
  ArbitraryDiff,
  ArbitraryRecordChangeset,
  SimpleOptions
} from './strategies/presets';
export {
  StrategyRegistry,
  createStrategyRegistry
} from './strategies/registry';
export type {
  StrategyFactory,
  StrategyPlan,
  StrategyScope
} from './strategies/registry';
export type {
  AnyValueStrategy,
  StrategyShape,
  ValueStrategy
} from './strategies/types';

export { defaultCompareKeys, normalizeDiffOptions } from './options';
export type { DiffOptions, KeyComparator } from './options';
export { isStructurallyEqual } from './utils/equality';

export {
  ChangesetError,
  InvariantViolationError,
  MappingError,
  SchemaValidationError,
  UnsupportedStrategyError,
  invariant
} from './errors';
export type { ChangesetErrorCode } from './errors';

export {
  applyMappingOperations,
  normalizeMappingOperations
} from './mapping/operations';
export { alignDatasets } from './mapping/align';
export {
  parseMappingOperations,
  validateWithSchema
} from './mapping/validator';
export type {
  AlignedDatasets,
  ExtractGroup,
  ExtractOperation,
  MappingOperations
} from './mapping/types';

export { diffValues } from './report/value-diff';
export type { ValueDiff, ValuePath } from './report/value-diff';
export {
  formatChangeset,
  formatValue,
  summarizeChangeset
} from './report/format';
export type { ReportOptions } from './report/format';
