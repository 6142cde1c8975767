/**
 * Schema validation - the precondition for code generation.
 *
 * Rules run in a fixed order and the first violation is reported, so a schema
 * that breaks several rules always yields the same code.
 */

import { isFieldKind, type FieldSpec, type RecordSchema, type RecordSchemaInput } from '@recordc/types';
import { SchemaError } from '../errors/RecordcError.js';

export const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export type SchemaValidationResult =
  | { valid: true; schema: RecordSchema }
  | { valid: false; error: SchemaError };

export function isIdentifier(value: string): boolean {
  return IDENTIFIER_PATTERN.test(value);
}

export function validateSchema(input: RecordSchemaInput): SchemaValidationResult {
  const schemaName = input.name;

  if (schemaName === '') {
    return invalid(new SchemaError(
      'Schema name is empty',
      'ERR_SCHEMA_EMPTY_NAME',
      {},
      'Give the record a name, e.g. "Person"'
    ));
  }

  if (!isIdentifier(schemaName)) {
    return invalid(new SchemaError(
      `Invalid schema name "${schemaName}": must match ${IDENTIFIER_PATTERN.source}`,
      'ERR_SCHEMA_INVALID_NAME',
      { schema: schemaName }
    ));
  }

  if (input.fields.length === 0) {
    return invalid(new SchemaError(
      `Schema ${schemaName} has no fields`,
      'ERR_SCHEMA_NO_FIELDS',
      { schema: schemaName },
      'Declare at least one field'
    ));
  }

  const seen = new Set<string>();
  const fields: FieldSpec[] = [];

  for (const [index, field] of input.fields.entries()) {
    if (field.name === '') {
      return invalid(new SchemaError(
        `Field #${index + 1} of ${schemaName} has an empty name`,
        'ERR_SCHEMA_EMPTY_FIELD_NAME',
        { schema: schemaName, index }
      ));
    }

    if (!isIdentifier(field.name)) {
      return invalid(new SchemaError(
        `Invalid field name "${field.name}" in ${schemaName}: must match ${IDENTIFIER_PATTERN.source}`,
        'ERR_SCHEMA_INVALID_FIELD_NAME',
        { schema: schemaName, field: field.name, index }
      ));
    }

    if (seen.has(field.name)) {
      return invalid(new SchemaError(
        `Duplicate field name "${field.name}" in ${schemaName}`,
        'ERR_SCHEMA_DUPLICATE_FIELD',
        { schema: schemaName, field: field.name, index }
      ));
    }
    seen.add(field.name);

    const kind = field.kind;
    if (kind === undefined || kind === null || kind === '') {
      return invalid(new SchemaError(
        `Field "${field.name}" in ${schemaName} has no type`,
        'ERR_SCHEMA_EMPTY_TYPE',
        { schema: schemaName, field: field.name, index },
        'Use one of: string, integer, boolean'
      ));
    }

    if (!isFieldKind(kind)) {
      return invalid(new SchemaError(
        `Unsupported type "${kind}" for field "${field.name}" in ${schemaName}`,
        'ERR_SCHEMA_UNSUPPORTED_TYPE',
        { schema: schemaName, field: field.name, index, kind },
        'Use one of: string, integer, boolean'
      ));
    }

    fields.push({ name: field.name, kind });
  }

  return { valid: true, schema: { name: schemaName, fields } };
}

/**
 * Throwing variant of validateSchema.
 */
export function assertValidSchema(input: RecordSchemaInput): RecordSchema {
  const result = validateSchema(input);
  if (!result.valid) {
    throw result.error;
  }
  return result.schema;
}

function invalid(error: SchemaError): SchemaValidationResult {
  return { valid: false, error };
}
