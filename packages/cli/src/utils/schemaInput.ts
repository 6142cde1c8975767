import { loadSchemaFile, validateSchema, type RecordSchema, type RecordSchemaInput } from '@recordc/core';
import { exitWithError, exitWithRecordcError } from './errorFormatter.js';

export function readSchemaInputOrExit(schemaPath: string): RecordSchemaInput {
  try {
    return loadSchemaFile(schemaPath);
  } catch (err) {
    exitWithRecordcError(err);
  }
}

/**
 * Load and validate a schema file for a command, exiting on any problem.
 */
export function loadValidSchemaOrExit(schemaPath: string): RecordSchema {
  const result = validateSchema(readSchemaInputOrExit(schemaPath));
  if (!result.valid) {
    const { error } = result;
    exitWithError(`${error.code}: ${error.message}`, error.suggestion ? [error.suggestion] : []);
  }
  return result.schema;
}
