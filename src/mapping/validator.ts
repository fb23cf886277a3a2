import type { StandardSchemaV1 } from '@standard-schema/spec';

import { SchemaValidationError } from '../errors';
import type { MappingOperations } from './types';

function formatIssuePath(issue: StandardSchemaV1.Issue): string {
  if (!issue.path || issue.path.length === 0) return 'unknown';
  return issue.path
    .map(segment =>
      typeof segment === 'object' ? String(segment.key) : String(segment)
    )
    .join('.');
}

/**
 * Validates raw input using a Standard Schema V1 compliant validator.
 *
 * The `~standard` property is the universal adapter defined by the Standard
 * Schema specification: it lets Zod, Valibot, ArkType and others be used
 * without library-specific code. Its `validate` returns `{ value }` or
 * `{ issues }` and never throws.
 *
 * Public overload: ties the return type to the schema's output type. The
 * implementation signature returns `unknown`, which keeps the body free of
 * type assertions.
 *
 * @param schema - The schema instance.
 * @param input - The raw value (e.g. parsed JSON configuration).
 * @param label - What is being validated, used in error messages.
 * @returns The validated (and possibly transformed) value.
 *
 * @throws {SchemaValidationError}
 * - If the schema object has no `~standard` property.
 * - If the validator is asynchronous (diffing is strictly synchronous).
 * - If validation reports issues (the first one is reported).
 */
export function validateWithSchema<S extends StandardSchemaV1>(
  schema: S,
  input: unknown,
  label: string
): StandardSchemaV1.InferOutput<S>;

export function validateWithSchema(
  schema: StandardSchemaV1,
  input: unknown,
  label: string
): unknown {
  // Guards against plain objects being passed where a schema is expected.
  if (!('~standard' in schema)) {
    throw new SchemaValidationError(
      label,
      'unknown',
      'expected a Standard Schema (an object with a "~standard" property), received a plain object'
    );
  }

  const result = schema['~standard'].validate(input);

  if (result instanceof Promise) {
    throw new SchemaValidationError(
      label,
      'unknown',
      'asynchronous schema validation is not supported'
    );
  }

  const [firstIssue] = result.issues ?? [];
  if (firstIssue) {
    throw new SchemaValidationError(
      label,
      formatIssuePath(firstIssue),
      firstIssue.message
    );
  }

  return 'value' in result ? result.value : input;
}

/**
 * Validates raw mapping configuration (e.g. a parsed JSON file) against a
 * caller-provided schema whose output is {@link MappingOperations}.
 */
export function parseMappingOperations<
  S extends StandardSchemaV1<unknown, Partial<MappingOperations>>
>(schema: S, input: unknown): StandardSchemaV1.InferOutput<S> {
  return validateWithSchema(schema, input, 'mapping operations');
}
