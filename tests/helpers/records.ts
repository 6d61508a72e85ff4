import { SasImplementationRecord } from '../../src/types';

export const PLACEHOLDER_KEY =
  '-----BEGIN PUBLIC KEY-----\nnot-a-real-key\n-----END PUBLIC KEY-----';

/**
 * A record that satisfies the bundled schemas
 */
export function validRecord(overrides: Partial<SasImplementationRecord> = {}): SasImplementationRecord {
  return {
    id: 'sas1/sas2/region1',
    name: 'Example SAS',
    administratorId: 'admin-42',
    contactInformation: [
      {
        contactType: 'TECHNICAL_CONTACT',
        name: 'Test Operator',
        email: 'ops@example.org',
        phoneNumber: '+1 555 0100',
      },
    ],
    publicKey: PLACEHOLDER_KEY,
    fccInformation: {
      fccId: 'TEST-FCC-001',
      certificationDate: '2024-01-15T00:00:00Z',
    },
    url: 'https://example.org/sas',
    ...overrides,
  };
}

/**
 * The same record as a loose object, for removing or adding fields
 */
export function looseRecord(): Record<string, unknown> {
  return { ...validRecord() };
}
