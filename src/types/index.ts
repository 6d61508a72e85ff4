import type { SchemaObject } from 'ajv';

/**
 * Kinds of contact a SAS implementation record can list
 */
export enum ContactType {
  Administrative = 'ADMINISTRATIVE_CONTACT',
  Technical = 'TECHNICAL_CONTACT',
  Operational = 'OPERATIONAL_CONTACT',
}

/**
 * A contactable party associated with a SAS implementation
 */
export interface ContactInformation {
  contactType: ContactType | string;
  name: string;
  title?: string;
  address?: string;
  phoneNumber?: string;
  email?: string;
}

/**
 * FCC certification metadata of a SAS implementation
 */
export interface FccInformation {
  fccId: string;
  certificationDate?: string;
  certificationExpiry?: string;
}

/**
 * A SAS Implementation Record as exchanged between SAS administrators.
 *
 * `administratorId` points at a Sas Administrator record; the implementation
 * record does not own it.
 */
export interface SasImplementationRecord {
  id: string;
  name: string;
  administratorId: string;
  contactInformation: ContactInformation[];
  publicKey: string;
  fccInformation: FccInformation;
  url: string;
}

/**
 * Top-level fields of a record, in schema order
 */
export const RECORD_FIELDS = [
  'id',
  'name',
  'administratorId',
  'contactInformation',
  'publicKey',
  'fccInformation',
  'url',
] as const;

export type RecordField = (typeof RECORD_FIELDS)[number];

/**
 * Categories of schema violations
 */
export enum ViolationKind {
  MissingRequiredField = 'MissingRequiredField',
  UnexpectedField = 'UnexpectedField',
  TypeMismatch = 'TypeMismatch',
  PatternViolation = 'PatternViolation',
  FormatViolation = 'FormatViolation',
  NestedSchemaViolation = 'NestedSchemaViolation',
}

/**
 * A single broken rule found while validating a candidate record
 */
export interface SchemaViolation {
  kind: ViolationKind;
  /** Top-level record field concerned, empty when the candidate itself is wrong */
  field: string;
  /** JSON pointer of the offending value, e.g. `/contactInformation/0/name` */
  path: string;
  /** Schema keyword that failed (`required`, `pattern`, `format`, ...) */
  rule: string;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  violations: SchemaViolation[];
}

/**
 * Application-layer remarks that never affect schema validity
 */
export enum AdvisoryCode {
  IdSegments = 'id-segments',
  PublicKeyUnparsable = 'public-key-unparsable',
  PublicKeyIsPrivate = 'public-key-is-private',
}

export interface Advisory {
  code: AdvisoryCode;
  field: RecordField;
  message: string;
}

export interface PublicKeyCheck {
  ok: boolean;
  /** Key algorithm reported by the crypto layer, e.g. `rsa` or `ec` */
  keyType?: string;
  /** `spki` for a bare public key, `certificate` for an X.509 certificate */
  encoding?: 'spki' | 'certificate';
  /** PEM label of a block that was refused, e.g. `PRIVATE KEY` */
  label?: string;
  error?: string;
}

/**
 * Full outcome of checking one candidate record
 */
export interface ValidationReport extends ValidationResult {
  id: string;
  timestamp: Date;
  source: string;
  advisories: Advisory[];
  publicKey?: PublicKeyCheck;
}

/**
 * A JSON Schema document as loaded from disk or supplied in memory
 */
export type SchemaDocument = SchemaObject;

/**
 * Server settings
 */
export interface ServerConfig {
  port: number;
}

/**
 * Validator configuration
 */
export interface ValidatorConfig {
  /** Directory holding the record schema and its sibling schemas */
  schemaDir: string;
  /** Report every violation instead of stopping at the first */
  allErrors: boolean;
  /** Parse `publicKey` as PEM after schema validation */
  checkPublicKey: boolean;
  server: ServerConfig;
}
