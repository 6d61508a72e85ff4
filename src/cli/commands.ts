import * as fs from 'fs';
import * as path from 'path';
import { SasRecordValidator, inspectRecord, parseRecord, RecordValidationError, FileSchemaResolver } from '../core';
import { BUNDLED_SCHEMA_DIR, RECORD_SCHEMA_FILE, SCHEMA_FILES } from '../config/schema-paths';
import { SchemaDocument, ValidationReport, ValidatorConfig } from '../types';

/**
 * Outcome of checking one file: a report, or the reason none could be made
 */
export interface FileResult {
  file: string;
  report?: ValidationReport;
  error?: string;
}

export interface ValidateFilesOptions {
  checkPublicKey?: boolean;
}

/**
 * Read, parse and validate each file. A file holding a JSON array is
 * treated as a batch of records.
 */
export async function validateFiles(
  validator: SasRecordValidator,
  files: string[],
  options: ValidateFilesOptions = {}
): Promise<FileResult[]> {
  const results: FileResult[] = [];

  for (const file of files) {
    let candidate: unknown;
    try {
      const content = await fs.promises.readFile(file, 'utf-8');
      candidate = parseRecord(content, file);
    } catch (e) {
      results.push({
        file,
        error: e instanceof RecordValidationError ? e.message : `Cannot read ${file}: ${e}`,
      });
      continue;
    }

    const candidates = Array.isArray(candidate) ? candidate : [candidate];
    candidates.forEach((item: unknown, index: number) => {
      const source = Array.isArray(candidate) ? `${file}[${index}]` : file;
      results.push({
        file: source,
        report: inspectRecord(validator, item, {
          source,
          checkPublicKey: options.checkPublicKey,
        }),
      });
    });
  }

  return results;
}

export function allPassed(results: FileResult[]): boolean {
  return results.every((r) => r.report !== undefined && r.report.valid);
}

/**
 * Human readable lines for one file result
 */
export function formatResult(result: FileResult): string[] {
  if (!result.report) {
    return [`✗ ${result.file}`, `    ${result.error ?? 'unknown error'}`];
  }

  const { report } = result;
  const lines = [`${report.valid ? '✓' : '✗'} ${result.file}`];
  for (const violation of report.violations) {
    lines.push(`    [${violation.kind}] ${violation.path || '/'}: ${violation.message}`);
  }
  for (const advisory of report.advisories) {
    lines.push(`    (advisory ${advisory.code}) ${advisory.message}`);
  }
  if (report.publicKey?.ok) {
    lines.push(`    public key: ${report.publicKey.keyType ?? 'unknown'} (${report.publicKey.encoding})`);
  }
  return lines;
}

export function summarize(results: FileResult[]): string {
  const passed = results.filter((r) => r.report?.valid).length;
  return `${passed}/${results.length} record(s) valid`;
}

/**
 * Load a schema by file name; the record schema always comes from the bundle
 */
export function readSchema(name: string, config: ValidatorConfig): SchemaDocument {
  const file = path.basename(name);
  const dir = file === RECORD_SCHEMA_FILE ? BUNDLED_SCHEMA_DIR : config.schemaDir;
  return new FileSchemaResolver(dir).readSync(file);
}

export function listSchemas(): string[] {
  return [...SCHEMA_FILES];
}
