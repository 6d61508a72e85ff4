import { serializeRecord, parseRecord } from './record-serializer';
import { createRecordValidator, SasRecordValidator } from './record-validator';
import { RecordParseError } from './errors';
import { silentLogger } from './logger';
import { RECORD_FIELDS, SasImplementationRecord } from '../types';
import { validRecord } from '../../tests/helpers/records';

describe('record serialization', () => {
  let validator: SasRecordValidator;

  beforeAll(async () => {
    validator = await createRecordValidator(undefined, { logger: silentLogger });
  });

  it('should write fields in schema order', () => {
    const record = validRecord();
    const shuffled: SasImplementationRecord = {
      url: record.url,
      fccInformation: record.fccInformation,
      publicKey: record.publicKey,
      contactInformation: record.contactInformation,
      administratorId: record.administratorId,
      name: record.name,
      id: record.id,
    };

    const text = serializeRecord(shuffled);

    expect(Object.keys(JSON.parse(text))).toEqual([...RECORD_FIELDS]);
    expect(text.startsWith('{\n  "id": "sas1/sas2/region1",\n  "name": "Example SAS",')).toBe(true);
  });

  it.each([
    ['the reference record', validRecord()],
    ['a record without contacts', validRecord({ contactInformation: [] })],
    ['a record with a long id', validRecord({ id: 'north/east/zone-7/sector-2' })],
  ])('should validate %s again after a round trip', (_label, record) => {
    const parsed = parseRecord(serializeRecord(record));

    expect(parsed).toEqual(record);
    expect(validator.validate(parsed)).toEqual({ valid: true, violations: [] });
  });

  it('should reject text that is not JSON', () => {
    expect(() => parseRecord('{"id":', 'broken.json')).toThrow(RecordParseError);
    expect(() => parseRecord('{"id":', 'broken.json')).toThrow(/^Cannot parse record from broken\.json: /);
  });
});
