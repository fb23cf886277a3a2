/**
 * Stable identifiers for every error raised by the library.
 */
export type ChangesetErrorCode =
  | 'UNSUPPORTED_STRATEGY'
  | 'INVARIANT_VIOLATION'
  | 'MAPPING_FAILED'
  | 'SCHEMA_INVALID';

/**
 * Base class for all library errors.
 *
 * Callers can branch on `code` instead of `instanceof` when errors cross
 * realm or bundle boundaries.
 */
export class ChangesetError extends Error {
  readonly code: ChangesetErrorCode;

  constructor(code: ChangesetErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Raised at strategy-resolution time when no strategy is registered for the
 * requested value kind under the requested scope.
 *
 * Resolution happens before any comparison runs, so this error never surfaces
 * in the middle of a diff.
 */
export class UnsupportedStrategyError extends ChangesetError {
  readonly kind: string;
  readonly scope: string;

  constructor(kind: string, scope: string, available: readonly string[] = []) {
    const hint =
      available.length > 0
        ? ` Registered scopes for "${kind}": ${available.join(', ')}.`
        : ` No strategies are registered for "${kind}".`;

    super(
      'UNSUPPORTED_STRATEGY',
      `No diff strategy is defined for value kind "${kind}" under scope "${scope}".${hint}`
    );
    this.kind = kind;
    this.scope = scope;
  }
}

/**
 * Raised when an internal invariant does not hold.
 * Never recoverable: it indicates a programming error in the library.
 */
export class InvariantViolationError extends ChangesetError {
  constructor(message: string) {
    super('INVARIANT_VIOLATION', `Invariant violation: ${message}`);
  }
}

/**
 * Raised when a key-space mapping operation cannot be applied to a dataset.
 */
export class MappingError extends ChangesetError {
  constructor(message: string) {
    super('MAPPING_FAILED', message);
  }
}

/**
 * Raised when raw input fails Standard Schema validation.
 */
export class SchemaValidationError extends ChangesetError {
  /**
   * Dotted path of the first reported issue, or `"unknown"`.
   */
  readonly issuePath: string;

  constructor(label: string, issuePath: string, detail: string) {
    super('SCHEMA_INVALID', `Invalid ${label} at "${issuePath}": ${detail}`);
    this.issuePath = issuePath;
  }
}

/**
 * Asserts an internal invariant.
 *
 * @param condition - The condition that must hold.
 * @param message - Description of the violated invariant.
 * @throws {InvariantViolationError} When `condition` is falsy.
 */
export function invariant(
  condition: unknown,
  message: string
): asserts condition {
  if (!condition) {
    throw new InvariantViolationError(message);
  }
}
