/**
 * Validate command - check a schema file without generating anything
 *
 * Usage:
 *   recordc validate person.yaml
 *   recordc validate person.json --json
 */

import { Command } from 'commander';
import { loadSchemaFile, validateSchema, RecordcError, type RecordSchemaInput } from '@recordc/core';
import { exitWithError, exitWithRecordcError } from '../utils/errorFormatter.js';

interface ValidateOptions {
  json?: boolean;
}

function readInput(schemaPath: string, options: ValidateOptions): RecordSchemaInput {
  try {
    return loadSchemaFile(schemaPath);
  } catch (err) {
    if (options.json && err instanceof RecordcError) {
      console.log(JSON.stringify({ valid: false, error: err.toJSON() }, null, 2));
      process.exit(1);
    }
    exitWithRecordcError(err);
  }
}

export const validateCommand = new Command('validate')
  .description('Check a schema file against the naming and type rules')
  .argument('<schema>', 'Schema file (.yaml, .yml or .json)')
  .option('-j, --json', 'Output the result as JSON')
  .addHelpText('after', `
Examples:
  recordc validate person.yaml         Check a YAML schema
  recordc validate person.json --json  Machine-readable result
`)
  .action((schemaPath: string, options: ValidateOptions) => {
    const result = validateSchema(readInput(schemaPath, options));

    if (options.json) {
      console.log(JSON.stringify(
        result.valid ? { valid: true, schema: result.schema } : { valid: false, error: result.error.toJSON() },
        null,
        2
      ));
      if (!result.valid) process.exit(1);
      return;
    }

    if (!result.valid) {
      const { error } = result;
      exitWithError(`${error.code}: ${error.message}`, error.suggestion ? [error.suggestion] : []);
    }

    const count = result.schema.fields.length;
    console.log(`✓ Schema ${result.schema.name} is valid (${count} field${count === 1 ? '' : 's'})`);
  });
