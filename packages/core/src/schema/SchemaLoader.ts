/**
 * SchemaLoader - reads record schemas from YAML or JSON files.
 *
 * Example (person.yaml):
 *
 * ```yaml
 * name: Person
 * fields:
 *   - name: name
 *     kind: string
 *   - name: age
 *     kind: integer
 *   - name: is_student
 *     kind: boolean
 * ```
 *
 * Only the shape is checked here. Naming and kind rules belong to validateSchema.
 */

import { readFileSync } from 'fs';
import { extname, resolve } from 'path';
import { parse as parseYAML } from 'yaml';
import type { FieldSpecInput, RecordSchemaInput } from '@recordc/types';
import { SchemaFileError } from '../errors/RecordcError.js';

export type SchemaFileFormat = 'yaml' | 'json';

export function detectSchemaFormat(filePath: string): SchemaFileFormat {
  return extname(filePath).toLowerCase() === '.json' ? 'json' : 'yaml';
}

/**
 * Load a schema file. THROWS SchemaFileError on unreadable or misshapen files.
 */
export function loadSchemaFile(filePath: string): RecordSchemaInput {
  const absolutePath = resolve(filePath);

  let content: string;
  try {
    content = readFileSync(absolutePath, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new SchemaFileError(
      `Cannot read schema file: ${message}`,
      'ERR_SCHEMA_FILE_UNREADABLE',
      { filePath: absolutePath }
    );
  }

  return parseSchemaDocument(content, detectSchemaFormat(absolutePath), absolutePath);
}

/**
 * Parse schema text. `filePath` is only used for error context.
 */
export function parseSchemaDocument(
  content: string,
  format: SchemaFileFormat,
  filePath = '<inline>'
): RecordSchemaInput {
  let raw: unknown;
  try {
    raw = format === 'json' ? JSON.parse(content) : parseYAML(content);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw invalidFile(`Failed to parse ${format.toUpperCase()}: ${message}`, filePath);
  }

  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw invalidFile('Schema file must contain an object with "name" and "fields"', filePath);
  }

  const name: unknown = 'name' in raw ? raw.name : undefined;
  if (typeof name !== 'string') {
    throw invalidFile(`Schema "name" must be a string, got ${describe(name)}`, filePath);
  }

  const fields: unknown = 'fields' in raw ? raw.fields : undefined;
  if (fields === undefined || fields === null) {
    return { name, fields: [] };
  }
  if (!Array.isArray(fields)) {
    throw invalidFile(`Schema "fields" must be a list, got ${describe(fields)}`, filePath);
  }

  return {
    name,
    fields: fields.map((entry: unknown, index) => readField(entry, index, filePath)),
  };
}

function readField(entry: unknown, index: number, filePath: string): FieldSpecInput {
  if (typeof entry !== 'object' || entry === null || Array.isArray(entry)) {
    throw invalidFile(`fields[${index}] must be an object, got ${describe(entry)}`, filePath);
  }

  const name: unknown = 'name' in entry ? entry.name : undefined;
  if (typeof name !== 'string') {
    throw invalidFile(`fields[${index}].name must be a string, got ${describe(name)}`, filePath);
  }

  const kind: unknown = 'kind' in entry ? entry.kind : undefined;
  if (kind === undefined || kind === null) {
    return { name, kind: null };
  }
  if (typeof kind !== 'string') {
    throw invalidFile(`fields[${index}].kind must be a string, got ${describe(kind)}`, filePath);
  }

  return { name, kind: kind.trim().toLowerCase() };
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function invalidFile(message: string, filePath: string): SchemaFileError {
  return new SchemaFileError(message, 'ERR_SCHEMA_FILE_INVALID', { filePath });
}
