import { RECORD_FIELDS, SasImplementationRecord } from '../types';
import { RecordParseError, errorMessage } from './errors';

/**
 * Serialize a record with its fields in schema order
 */
export function serializeRecord(record: SasImplementationRecord): string {
  const ordered: Record<string, unknown> = {};
  for (const field of RECORD_FIELDS) {
    ordered[field] = record[field];
  }
  return JSON.stringify(ordered, null, 2);
}

/**
 * Parse record text. The result is untrusted until validated.
 */
export function parseRecord(text: string, source: string = 'input'): unknown {
  try {
    return JSON.parse(text);
  } catch (e) {
    throw new RecordParseError(`Cannot parse record from ${source}: ${errorMessage(e)}`, {
      source,
    });
  }
}
