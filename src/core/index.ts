export { SasRecordValidator, createRecordValidator, loadBundledRecordSchema } from './record-validator';
export type { RecordValidatorOptions, RecordCheck } from './record-validator';
export {
  FileSchemaResolver,
  InMemorySchemaResolver,
  schemaFileName,
  parseSchemaDocument,
} from './schema-resolver';
export type { SchemaResolver } from './schema-resolver';
export { inspectRecord, idAdvisory } from './record-inspector';
export type { InspectOptions } from './record-inspector';
export { checkPublicKey, isPrivateKeyLabel } from './public-key';
export { serializeRecord, parseRecord } from './record-serializer';
export { toViolation, toViolations } from './violations';
export * from './errors';
