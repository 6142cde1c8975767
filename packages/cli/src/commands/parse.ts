/**
 * Parse command - build a parser for a schema and run documents through it
 *
 * Documents come from the arguments, or one per line from stdin when none
 * are given. Each result is printed as one JSON line, in input order:
 *   {"name":"John Doe","age":"25","is_student":false}
 *   {"error":{"code":"ERR_PARSE_FAILED","message":"Parser rejected the document"}}
 */

import { Command } from 'commander';
import { resolve } from 'path';
import { createInterface } from 'readline';
import {
  buildOptionsFromConfig,
  buildParser,
  closeLogger,
  ConsoleLogger,
  isParserBackend,
  loadConfig,
  RecordcError,
  type CompiledParser,
  type RecordcConfig,
} from '@recordc/core';
import { exitWithError, exitWithRecordcError } from '../utils/errorFormatter.js';
import { createCliLogger, type LogOptions } from '../utils/logOptions.js';
import { loadValidSchemaOrExit } from '../utils/schemaInput.js';

interface ParseOptions extends LogOptions {
  project: string;
  backend?: string;
  timeout?: string;
  compiler?: string;
}

function loadConfigOrExit(projectPath: string): RecordcConfig {
  try {
    return loadConfig(projectPath, new ConsoleLogger('warnings'));
  } catch (err) {
    exitWithRecordcError(err);
  }
}

function parseTimeout(value: string): number {
  const timeoutMs = Number(value);
  if (!Number.isInteger(timeoutMs) || timeoutMs < 0) {
    exitWithError(`Invalid --timeout "${value}"`, ['Use a whole number of milliseconds, 0 for no limit']);
  }
  return timeoutMs;
}

async function* readDocuments(documents: string[]): AsyncGenerator<string> {
  if (documents.length > 0) {
    yield* documents;
    return;
  }

  const lines = createInterface({ input: process.stdin, crlfDelay: Infinity });
  for await (const line of lines) {
    if (line.trim()) {
      yield line;
    }
  }
}

async function parseAll(parser: CompiledParser, documents: AsyncGenerator<string>, timeoutMs?: number): Promise<number> {
  let failures = 0;

  for await (const document of documents) {
    try {
      const record = await parser.parse(document, { timeoutMs });
      console.log(JSON.stringify(record));
    } catch (err) {
      if (!(err instanceof RecordcError)) throw err;
      failures++;
      console.log(JSON.stringify({ error: { code: err.code, message: err.message } }));
    }
  }

  return failures;
}

export const parseCommand = new Command('parse')
  .description('Compile a parser for a schema and parse documents with it')
  .argument('<schema>', 'Schema file (.yaml, .yml or .json)')
  .argument('[documents...]', 'Documents to parse (default: one per stdin line)')
  .option('-p, --project <path>', 'Project path holding .recordc/config.yaml', '.')
  .option('-b, --backend <backend>', 'Parser backend: process or worker')
  .option('-t, --timeout <ms>', 'Per-document timeout in milliseconds')
  .option('--compiler <command>', 'C compiler to use')
  .option('-q, --quiet', 'Suppress log output')
  .option('-v, --verbose', 'Show build and parse logs')
  .option('--log-level <level>', 'Set log level (silent, errors, warnings, info, debug)')
  .option('--log-file <path>', 'Write all log output to a file')
  .addHelpText('after', `
Examples:
  recordc parse person.yaml '{"name": "John Doe", "age": 25}'
  cat people.jsonl | recordc parse person.yaml --backend worker
  recordc parse person.yaml -v --timeout 2000 '{"age": 7}'

Exit code is 1 when any document fails to parse.
`)
  .action(async (schemaPath: string, documents: string[], options: ParseOptions) => {
    const schema = loadValidSchemaOrExit(schemaPath);
    const projectPath = resolve(options.project);
    const config = loadConfigOrExit(projectPath);

    if (options.backend !== undefined && !isParserBackend(options.backend)) {
      exitWithError(`Unknown backend "${options.backend}"`, ['Use: process or worker']);
    }
    const timeoutMs = options.timeout !== undefined ? parseTimeout(options.timeout) : undefined;

    const logger = createCliLogger(options, config.logLevel, config.logFile);
    const buildOptions = buildOptionsFromConfig(config, projectPath, logger);
    if (options.backend !== undefined && isParserBackend(options.backend)) {
      buildOptions.backend = options.backend;
    }
    if (options.compiler) {
      buildOptions.compiler = options.compiler;
    }

    let parser: CompiledParser;
    try {
      parser = await buildParser(schema, buildOptions);
    } catch (err) {
      await closeLogger(logger);
      exitWithRecordcError(err);
    }

    let failures: number;
    try {
      failures = await parseAll(parser, readDocuments(documents), timeoutMs);
    } finally {
      await parser.close();
      await closeLogger(logger);
    }

    if (failures > 0) {
      process.exitCode = 1;
    }
  });
