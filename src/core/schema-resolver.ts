import * as fs from 'fs';
import * as path from 'path';
import { SchemaDocument } from '../types';
import { SchemaLoadError, errorMessage } from './errors';

/**
 * Turns a `$ref` target such as `file:ContactInformation.schema.json`
 * into the schema document it names.
 */
export interface SchemaResolver {
  resolve(uri: string): Promise<SchemaDocument>;
}

/**
 * Reduce a reference URI to the schema file name it points at.
 * `file:Foo.schema.json`, `file:///x/Foo.schema.json#/defs` and `Foo.schema.json`
 * all yield `Foo.schema.json`.
 */
export function schemaFileName(uri: string): string {
  const withoutFragment = uri.split('#')[0];
  const withoutScheme = withoutFragment.replace(/^file:/i, '');
  const name = path.posix.basename(withoutScheme.replace(/\\/g, '/'));
  if (!name || name === '.' || name === '..') {
    throw new SchemaLoadError(`Cannot derive a schema file name from "${uri}"`, uri);
  }
  return name;
}

export function isSchemaDocument(value: unknown): value is SchemaDocument {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse schema text, failing with a SchemaLoadError for anything but a JSON object
 */
export function parseSchemaDocument(text: string, uri: string): SchemaDocument {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e) {
    throw new SchemaLoadError(`Schema ${uri} is not valid JSON: ${errorMessage(e)}`, uri);
  }
  if (!isSchemaDocument(parsed)) {
    throw new SchemaLoadError(`Schema ${uri} must be a JSON object`, uri);
  }
  return parsed;
}

/**
 * Resolves references to files in a single directory
 */
export class FileSchemaResolver implements SchemaResolver {
  private dirPath: string;

  constructor(dirPath: string) {
    this.dirPath = path.resolve(dirPath);
  }

  async resolve(uri: string): Promise<SchemaDocument> {
    const filepath = path.join(this.dirPath, schemaFileName(uri));

    let content: string;
    try {
      content = await fs.promises.readFile(filepath, 'utf-8');
    } catch (e) {
      throw new SchemaLoadError(`Cannot read schema ${filepath}: ${errorMessage(e)}`, uri);
    }
    return parseSchemaDocument(content, uri);
  }

  /**
   * Read a schema synchronously, for callers that serve the raw documents
   */
  readSync(name: string): SchemaDocument {
    const filepath = path.join(this.dirPath, schemaFileName(name));
    if (!fs.existsSync(filepath)) {
      throw new SchemaLoadError(`Schema not found: ${name}`, name);
    }
    return parseSchemaDocument(fs.readFileSync(filepath, 'utf-8'), name);
  }
}

/**
 * Serves schemas from memory, keyed by file name
 */
export class InMemorySchemaResolver implements SchemaResolver {
  private documents: Map<string, SchemaDocument>;

  constructor(documents: Record<string, SchemaDocument>) {
    this.documents = new Map(Object.entries(documents));
  }

  async resolve(uri: string): Promise<SchemaDocument> {
    const name = schemaFileName(uri);
    const document = this.documents.get(name);
    if (!document) {
      throw new SchemaLoadError(`No schema registered for ${uri}`, uri);
    }
    return document;
  }
}
