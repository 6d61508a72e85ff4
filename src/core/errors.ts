import { SchemaViolation } from '../types';

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Base class for errors raised by the record validator
 */
export abstract class RecordValidationError extends Error {
  abstract readonly code: string;

  constructor(message: string, public readonly context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * A candidate record does not conform to the schema
 */
export class SchemaViolationError extends RecordValidationError {
  readonly code = 'SCHEMA_VIOLATION';

  constructor(public readonly violations: SchemaViolation[]) {
    super(
      violations.length === 1
        ? `Record violates schema: ${violations[0].message}`
        : `Record violates schema (${violations.length} violations)`,
      { violations }
    );
  }
}

/**
 * A schema document could not be found, read or compiled
 */
export class SchemaLoadError extends RecordValidationError {
  readonly code = 'SCHEMA_LOAD_ERROR';

  constructor(message: string, public readonly uri?: string) {
    super(message, { uri });
  }
}

/**
 * Record text is not valid JSON
 */
export class RecordParseError extends RecordValidationError {
  readonly code = 'RECORD_PARSE_ERROR';
}

/**
 * Configuration is unusable
 */
export class ConfigError extends RecordValidationError {
  readonly code = 'CONFIG_ERROR';

  constructor(public readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`, { problems });
  }
}
