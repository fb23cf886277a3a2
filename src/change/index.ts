export type {
  Add,
  Change,
  HasChanges,
  Modify,
  PureChange,
  Remove
} from './types';
export { Different, Equal, isModification } from './modification';
export type { Modification } from './modification';
export { createAdd, createModify, createRemove } from './factories';
