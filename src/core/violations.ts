import type { ErrorObject } from 'ajv';
import { SchemaViolation, ViolationKind } from '../types';

const KEYWORD_KINDS: Record<string, ViolationKind> = {
  required: ViolationKind.MissingRequiredField,
  additionalProperties: ViolationKind.UnexpectedField,
  type: ViolationKind.TypeMismatch,
  pattern: ViolationKind.PatternViolation,
  format: ViolationKind.FormatViolation,
};

/**
 * Fields whose values are checked against a referenced schema
 */
const NESTED_FIELDS = new Set(['contactInformation', 'fccInformation']);

export function parsePointer(pointer: string): string[] {
  if (!pointer) return [];
  return pointer
    .split('/')
    .slice(1)
    .map((segment) => segment.replace(/~1/g, '/').replace(/~0/g, '~'));
}

export function toPointer(segments: string[]): string {
  return segments.map((s) => '/' + s.replace(/~/g, '~0').replace(/\//g, '~1')).join('');
}

function stringParam(error: ErrorObject, name: string): string | undefined {
  const value: unknown = error.params[name];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Location of the value an error is about. For `required` and
 * `additionalProperties` Ajv reports the parent object, so the property
 * name is appended.
 */
function offendingLocation(error: ErrorObject): string[] {
  const segments = parsePointer(error.instancePath);
  const property =
    error.keyword === 'required'
      ? stringParam(error, 'missingProperty')
      : error.keyword === 'additionalProperties'
        ? stringParam(error, 'additionalProperty')
        : undefined;
  return property === undefined ? segments : [...segments, property];
}

function describe(kind: ViolationKind, field: string, path: string, error: ErrorObject): string {
  switch (kind) {
    case ViolationKind.MissingRequiredField:
      return `Missing required field "${field}"`;
    case ViolationKind.UnexpectedField:
      return `Unexpected field "${field}"`;
    case ViolationKind.TypeMismatch:
      return field
        ? `Field "${field}" must be of type ${stringParam(error, 'type') ?? 'unknown'}`
        : `Record must be of type ${stringParam(error, 'type') ?? 'object'}`;
    case ViolationKind.PatternViolation:
      return `Field "${field}" must match pattern ${stringParam(error, 'pattern') ?? ''}`.trimEnd();
    case ViolationKind.FormatViolation:
      return `Field "${field}" must be a valid ${stringParam(error, 'format') ?? 'value'}`;
    case ViolationKind.NestedSchemaViolation:
      return `Invalid ${field} at ${path}: ${error.message ?? error.keyword}`;
  }
}

/**
 * Map one Ajv error onto the record violation taxonomy
 */
export function toViolation(error: ErrorObject): SchemaViolation {
  const location = offendingLocation(error);
  const field = location[0] ?? '';
  const path = toPointer(location);

  let kind: ViolationKind;
  if (location.length > 1) {
    kind = ViolationKind.NestedSchemaViolation;
  } else if (KEYWORD_KINDS[error.keyword]) {
    kind = KEYWORD_KINDS[error.keyword];
  } else {
    kind = NESTED_FIELDS.has(field)
      ? ViolationKind.NestedSchemaViolation
      : ViolationKind.TypeMismatch;
  }

  return {
    kind,
    field,
    path,
    rule: error.keyword,
    message: describe(kind, field, path, error),
  };
}

export function toViolations(errors: ErrorObject[] | null | undefined): SchemaViolation[] {
  return (errors ?? []).map(toViolation);
}
