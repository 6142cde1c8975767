/**
 * Generate command - emit the C sources for a schema without compiling
 *
 * Usage:
 *   recordc generate person.yaml              Print header + implementation
 *   recordc generate person.yaml -o build/    Write Person.h, Person.c, main_Person.c
 */

import { Command } from 'commander';
import { resolve } from 'path';
import { generateSource, generateToDirectory } from '@recordc/core';
import { exitWithRecordcError } from '../utils/errorFormatter.js';
import { loadValidSchemaOrExit } from '../utils/schemaInput.js';

interface GenerateOptions {
  output?: string;
  driver?: boolean;
}

export const generateCommand = new Command('generate')
  .description('Generate the C parser sources for a schema')
  .argument('<schema>', 'Schema file (.yaml, .yml or .json)')
  .option('-o, --output <dir>', 'Write the sources into this directory')
  .option('--driver', 'Also print the driver program (stdout mode only)')
  .addHelpText('after', `
Examples:
  recordc generate person.yaml
  recordc generate person.yaml -o ./generated
`)
  .action(async (schemaPath: string, options: GenerateOptions) => {
    const schema = loadValidSchemaOrExit(schemaPath);

    if (options.output) {
      try {
        const files = await generateToDirectory(schema, resolve(options.output));
        console.log(`✓ Wrote ${files.header}`);
        console.log(`✓ Wrote ${files.implementation}`);
        console.log(`✓ Wrote ${files.driver}`);
      } catch (err) {
        exitWithRecordcError(err);
      }
      return;
    }

    try {
      const source = generateSource(schema);
      process.stdout.write(source.combined);
      if (options.driver) {
        process.stdout.write(`\n${source.driver}`);
      }
    } catch (err) {
      exitWithRecordcError(err);
    }
  });
