import Ajv from 'ajv-draft-04';
import addFormats from 'ajv-formats';
import type { ValidateFunction } from 'ajv';
import * as path from 'path';
import { SasImplementationRecord, SchemaDocument, ValidationResult } from '../types';
import { BUNDLED_SCHEMA_DIR, RECORD_SCHEMA_FILE } from '../config/schema-paths';
import { Logger, defaultLogger } from './logger';
import { FileSchemaResolver, SchemaResolver } from './schema-resolver';
import { SchemaLoadError, SchemaViolationError, errorMessage } from './errors';
import { toViolations } from './violations';

export interface RecordValidatorOptions {
  /** Supplies the schemas referenced by `$ref` from the record schema */
  resolver: SchemaResolver;
  /** Record schema to compile; defaults to the bundled one */
  recordSchema?: SchemaDocument;
  /** Report every violation (default) or only the first */
  allErrors?: boolean;
  logger?: Logger;
}

export interface RecordCheck {
  result: ValidationResult;
  /** Set only when the candidate is valid */
  record?: SasImplementationRecord;
}

/**
 * Route Ajv's own warnings through the injected logger
 */
function ajvLogger(logger: Logger) {
  const join = (args: unknown[]): string => args.map(String).join(' ');
  return {
    log: (...args: unknown[]) => logger.log(join(args)),
    warn: (...args: unknown[]) => logger.warn(join(args)),
    error: (...args: unknown[]) => logger.error(join(args)),
  };
}

/**
 * Read the record schema shipped with this package
 */
export async function loadBundledRecordSchema(): Promise<SchemaDocument> {
  return new FileSchemaResolver(BUNDLED_SCHEMA_DIR).resolve(RECORD_SCHEMA_FILE);
}

/**
 * Validates candidate SAS Implementation Records.
 *
 * Instances are built once through `create`, which compiles the record
 * schema together with every schema it references, and are frozen
 * afterwards. `validate` has no side effects, so a single instance can be
 * shared by every caller in the process.
 */
export class SasRecordValidator {
  private readonly validateFn: ValidateFunction<SasImplementationRecord>;
  readonly referencedSchemas: readonly string[];

  private constructor(
    validateFn: ValidateFunction<SasImplementationRecord>,
    referencedSchemas: string[]
  ) {
    this.validateFn = validateFn;
    this.referencedSchemas = Object.freeze([...referencedSchemas]);
    Object.freeze(this);
  }

  static async create(options: RecordValidatorOptions): Promise<SasRecordValidator> {
    const logger = options.logger ?? defaultLogger;
    const referenced: string[] = [];

    const ajv = new Ajv({
      allErrors: options.allErrors ?? true,
      strict: false,
      logger: ajvLogger(logger),
      loadSchema: async (uri: string) => {
        const schema = await options.resolver.resolve(uri);
        referenced.push(uri);
        return schema;
      },
    });
    addFormats(ajv);

    const recordSchema = options.recordSchema ?? (await loadBundledRecordSchema());

    let validateFn: ValidateFunction<SasImplementationRecord>;
    try {
      validateFn = await ajv.compileAsync<SasImplementationRecord>(recordSchema);
    } catch (e) {
      if (e instanceof SchemaLoadError) throw e;
      throw new SchemaLoadError(`Failed to compile record schema: ${errorMessage(e)}`);
    }

    logger.log(
      `Record schema compiled${referenced.length > 0 ? ` with ${referenced.join(', ')}` : ''}`
    );
    return new SasRecordValidator(validateFn, referenced);
  }

  /**
   * Check a candidate record, reporting every broken rule
   */
  validate(candidate: unknown): ValidationResult {
    return this.check(candidate).result;
  }

  /**
   * Validate once and hand back the narrowed record when it conforms
   */
  check(candidate: unknown): RecordCheck {
    if (this.validateFn(candidate)) {
      return { result: { valid: true, violations: [] }, record: candidate };
    }
    return { result: { valid: false, violations: toViolations(this.validateFn.errors) } };
  }

  isValid(candidate: unknown): candidate is SasImplementationRecord {
    return this.validateFn(candidate);
  }

  /**
   * Narrow a candidate to a record, throwing SchemaViolationError otherwise
   */
  assertValid(candidate: unknown): SasImplementationRecord {
    if (this.validateFn(candidate)) {
      return candidate;
    }
    throw new SchemaViolationError(toViolations(this.validateFn.errors));
  }
}

/**
 * Build a validator whose referenced schemas are read from `schemaDir`
 */
export function createRecordValidator(
  schemaDir: string = BUNDLED_SCHEMA_DIR,
  options: Omit<RecordValidatorOptions, 'resolver'> = {}
): Promise<SasRecordValidator> {
  return SasRecordValidator.create({
    ...options,
    resolver: new FileSchemaResolver(path.resolve(schemaDir)),
  });
}
