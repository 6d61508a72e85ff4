import { v4 as uuidv4 } from 'uuid';
import { Advisory, AdvisoryCode, ValidationReport } from '../types';
import { SasRecordValidator } from './record-validator';
import { checkPublicKey, isPrivateKeyLabel } from './public-key';

export interface InspectOptions {
  /** Label of where the candidate came from (file name, `api`, ...) */
  source?: string;
  /** Parse `publicKey` once the record passes the schema */
  checkPublicKey?: boolean;
}

/**
 * Ids that satisfy the schema pattern but are not exactly three non-empty
 * segments. The pattern is unanchored, so `a/b/c/d` and `a/b/c/` pass it.
 */
export function idAdvisory(id: string): Advisory | undefined {
  const segments = id.split('/');
  if (segments.length === 3 && segments.every((s) => s.length > 0)) {
    return undefined;
  }
  return {
    code: AdvisoryCode.IdSegments,
    field: 'id',
    message: `Record id "${id}" has ${segments.length} slash-separated segments; expected exactly three non-empty ones`,
  };
}

/**
 * Validate a candidate and attach the application-layer findings
 */
export function inspectRecord(
  validator: SasRecordValidator,
  candidate: unknown,
  options: InspectOptions = {}
): ValidationReport {
  const { result, record } = validator.check(candidate);
  const report: ValidationReport = {
    id: uuidv4(),
    timestamp: new Date(),
    source: options.source ?? 'unknown',
    valid: result.valid,
    violations: result.violations,
    advisories: [],
  };

  if (!record) {
    return report;
  }

  const advisory = idAdvisory(record.id);
  if (advisory) {
    report.advisories.push(advisory);
  }

  if (options.checkPublicKey) {
    const keyCheck = checkPublicKey(record.publicKey);
    report.publicKey = keyCheck;
    if (!keyCheck.ok) {
      report.advisories.push(
        isPrivateKeyLabel(keyCheck.label)
          ? {
              code: AdvisoryCode.PublicKeyIsPrivate,
              field: 'publicKey',
              message: `publicKey holds a ${keyCheck.label} block; a private key must never be published`,
            }
          : {
              code: AdvisoryCode.PublicKeyUnparsable,
              field: 'publicKey',
              message: `Public key could not be parsed: ${keyCheck.error ?? 'unknown error'}`,
            }
      );
    }
  }

  return report;
}
