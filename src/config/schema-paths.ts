import * as path from 'path';

/**
 * Directory of the schemas shipped with this package.
 * Resolves the same from `src/config` and from the compiled `dist/config`.
 */
export const BUNDLED_SCHEMA_DIR = path.resolve(__dirname, '../../schemas');

export const RECORD_SCHEMA_FILE = 'SasImplementationRecord.schema.json';
export const CONTACT_INFORMATION_SCHEMA_FILE = 'ContactInformation.schema.json';
export const FCC_INFORMATION_SCHEMA_FILE = 'FccInformation.schema.json';

/**
 * Schemas the record schema points at through `$ref`
 */
export const REFERENCED_SCHEMA_FILES = [CONTACT_INFORMATION_SCHEMA_FILE, FCC_INFORMATION_SCHEMA_FILE];

export const SCHEMA_FILES = [RECORD_SCHEMA_FILE, ...REFERENCED_SCHEMA_FILES];
