/**
 * Builder - schema in, ready parser handle out.
 *
 * validate → generate → workspace → write sources → compile → backend.
 * Once the workspace exists, every failure disposes it before rethrowing.
 */

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import type { CompiledParser, Logger, ParserBackend, RecordSchema } from '@recordc/types';
import { BuildError, RecordcError } from '../errors/RecordcError.js';
import { createLogger } from '../logging/Logger.js';
import { assertValidSchema } from '../schema/validateSchema.js';
import { generateSource, sourceFileNames, splitAtHeaderGuard } from '../codegen/CodeGenerator.js';
import { formatCommand, runProcess as defaultRunProcess, type RunProcess } from '../utils/runProcess.js';
import { ProcessParser } from '../runtime/ProcessParser.js';
import { WorkerParser, type SpawnWorker } from '../runtime/WorkerParser.js';
import { DEFAULT_PARSE_TIMEOUT_MS } from '../runtime/ParserHandle.js';
import { Workspace } from './Workspace.js';
import { compilerArgs, DEFAULT_COMPILER_FLAGS, findCompiler, getCompilerNotFoundMessage } from './Toolchain.js';

export const DEFAULT_BUILD_TIMEOUT_MS = 60_000;

export interface BuildOptions {
  /** Default: 'process' */
  backend?: ParserBackend;
  /** Compiler command or path; discovered when omitted */
  compiler?: string;
  compilerFlags?: readonly string[];
  /** Compilation limit in ms; 0 disables it */
  buildTimeoutMs?: number;
  /** Default per-call limit for the built parser */
  parseTimeoutMs?: number;
  /** Parent of the build workspace; defaults to os.tmpdir() */
  workspaceRoot?: string;
  logger?: Logger;
  /** Internal: dependency injection for testing */
  _deps?: {
    runProcess?: RunProcess;
    findCompiler?: (explicitCommand: string | undefined) => string | null;
    spawnWorker?: SpawnWorker;
  };
}

function generate(schema: RecordSchema) {
  try {
    return generateSource(schema);
  } catch (err) {
    if (err instanceof RecordcError) throw err;
    const message = err instanceof Error ? err.message : String(err);
    throw new BuildError(`Code generation failed for ${schema.name}: ${message}`, 'ERR_BUILD_TEMPLATE', {
      schema: schema.name,
    });
  }
}

async function compile(
  compiler: string,
  args: string[],
  workspace: Workspace,
  schemaName: string,
  options: BuildOptions,
  logger: Logger
): Promise<void> {
  const run = options._deps?.runProcess ?? defaultRunProcess;
  const timeoutMs = options.buildTimeoutMs ?? DEFAULT_BUILD_TIMEOUT_MS;

  logger.info('Compiling parser', { schema: schemaName, compiler });
  logger.debug('Compiler command', { command: formatCommand(compiler, args) });

  const outcome = await run(compiler, args, { cwd: workspace.dir, timeoutMs });
  const context = { schema: schemaName, compiler };

  switch (outcome.status) {
    case 'exited': {
      if (outcome.exitCode === 0) {
        if (outcome.output.trim()) {
          logger.debug('Compiler output', { schema: schemaName, output: outcome.output });
        }
        return;
      }
      const detail = outcome.output.trim();
      throw new BuildError(
        `Compilation failed for ${schemaName} (exit code ${outcome.exitCode ?? outcome.signal})` +
          (detail ? `\n${detail}` : ''),
        'ERR_BUILD_COMPILER_FAILED',
        { ...context, exitCode: outcome.exitCode, toolOutput: outcome.output }
      );
    }
    case 'spawn-failed':
      throw new BuildError(
        `Cannot run compiler ${compiler}: ${outcome.error.message}`,
        'ERR_BUILD_COMPILER_FAILED',
        { ...context, toolOutput: '' },
        'Check compiler.command in .recordc/config.yaml or the RECORDC_CC variable'
      );
    case 'timed-out':
      throw new BuildError(
        `Compilation of ${schemaName} did not finish within ${timeoutMs}ms`,
        'ERR_BUILD_TIMEOUT',
        { ...context, timeoutMs, toolOutput: outcome.output },
        'Raise compiler.timeoutMs in .recordc/config.yaml'
      );
    case 'aborted':
      throw new BuildError(`Compilation of ${schemaName} was interrupted`, 'ERR_BUILD_COMPILER_FAILED', {
        ...context,
        toolOutput: outcome.output,
      });
  }
}

/**
 * Build a parser for `schema`.
 *
 * THROWS SchemaError when the schema is invalid and BuildError for everything
 * between code generation and a finished executable.
 */
export async function buildParser(schema: RecordSchema, options: BuildOptions = {}): Promise<CompiledParser> {
  const logger = options.logger ?? createLogger('warnings');
  const validated = assertValidSchema(schema);
  const source = generate(validated);
  const files = sourceFileNames(validated.name);

  logger.debug('Generated source', { schema: validated.name, fields: validated.fields.length });

  const locate: (explicitCommand: string | undefined) => string | null =
    options._deps?.findCompiler ?? ((explicitCommand) => findCompiler({ explicitCommand }));
  const compiler = locate(options.compiler);
  if (!compiler) {
    throw new BuildError(
      options.compiler ? `C compiler not found: ${options.compiler}` : 'No C compiler found',
      'ERR_BUILD_COMPILER_NOT_FOUND',
      { schema: validated.name, compiler: options.compiler },
      getCompilerNotFoundMessage()
    );
  }

  const workspace = await Workspace.create({
    root: options.workspaceRoot,
    prefix: `recordc-${validated.name}-`,
    logger,
  });

  try {
    const { header, implementation } = splitAtHeaderGuard(source.combined, validated.name);
    await workspace.writeSource(files.header, header);
    const implementationPath = await workspace.writeSource(files.implementation, implementation);
    const driverPath = await workspace.writeSource(files.driver, source.driver);
    const artifactPath = workspace.path(files.executable);

    const args = compilerArgs(options.compilerFlags ?? DEFAULT_COMPILER_FLAGS, artifactPath, [
      driverPath,
      implementationPath,
    ]);
    await compile(compiler, args, workspace, validated.name, options, logger);

    const handleOptions = {
      schema: validated,
      artifactPath,
      workspace,
      parseTimeoutMs: options.parseTimeoutMs ?? DEFAULT_PARSE_TIMEOUT_MS,
      logger,
    };
    const backend = options.backend ?? 'process';
    logger.info('Parser ready', { schema: validated.name, backend, artifactPath });

    switch (backend) {
      case 'process':
        return new ProcessParser({ ...handleOptions, _deps: { runProcess: options._deps?.runProcess } });
      case 'worker':
        return new WorkerParser({ ...handleOptions, _deps: { spawnWorker: options._deps?.spawnWorker } });
    }
  } catch (err) {
    await workspace.dispose();
    throw err;
  }
}

/**
 * Build, hand the parser to `fn`, close it whatever `fn` does.
 */
export async function withParser<T>(
  schema: RecordSchema,
  options: BuildOptions,
  fn: (parser: CompiledParser) => Promise<T>
): Promise<T> {
  const parser = await buildParser(schema, options);
  try {
    return await fn(parser);
  } finally {
    await parser.close();
  }
}

export interface GeneratedFiles {
  header: string;
  implementation: string;
  driver: string;
}

/**
 * Write the three sources into `dir` without compiling. Returns their paths.
 */
export async function generateToDirectory(schema: RecordSchema, dir: string): Promise<GeneratedFiles> {
  const validated = assertValidSchema(schema);
  const source = generate(validated);
  const names = sourceFileNames(validated.name);
  const { header, implementation } = splitAtHeaderGuard(source.combined, validated.name);

  const paths: GeneratedFiles = {
    header: join(dir, names.header),
    implementation: join(dir, names.implementation),
    driver: join(dir, names.driver),
  };

  try {
    await mkdir(dir, { recursive: true });
    await writeFile(paths.header, header, 'utf-8');
    await writeFile(paths.implementation, implementation, 'utf-8');
    await writeFile(paths.driver, source.driver, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new BuildError(`Cannot write generated sources to ${dir}: ${message}`, 'ERR_BUILD_SOURCE_WRITE', {
      schema: validated.name,
      filePath: dir,
    });
  }

  return paths;
}
