/**
 * @recordc/core - schema validation, C code generation, build and parser runtime
 */

// Error types
export {
  RecordcError,
  SchemaError,
  SchemaFileError,
  BuildError,
  ParseError,
  ConfigError,
  SCHEMA_ERROR_CODES,
} from './errors/RecordcError.js';
export type {
  ErrorContext,
  ErrorSeverity,
  RecordcErrorJSON,
  SchemaErrorCode,
  SchemaFileErrorCode,
  BuildErrorCode,
  ParseErrorCode,
} from './errors/RecordcError.js';

// Logging
export {
  ConsoleLogger,
  FileLogger,
  MultiLogger,
  createLogger,
  closeLogger,
  isLogLevel,
  formatLogLine,
} from './logging/Logger.js';
export type { Logger, LogLevel } from './logging/Logger.js';

// Version
export { RECORDC_VERSION, PROTOCOL_VERSION, getSchemaVersion } from './version.js';

// Config
export {
  loadConfig,
  validateConfig,
  validateVersion,
  buildOptionsFromConfig,
  getConfigPath,
  DEFAULT_CONFIG,
  CONFIG_DIR,
  CONFIG_FILE,
} from './config/index.js';
export type { RecordcConfig, CompilerConfig } from './config/index.js';

// Schema
export { validateSchema, assertValidSchema, isIdentifier, IDENTIFIER_PATTERN } from './schema/validateSchema.js';
export type { SchemaValidationResult } from './schema/validateSchema.js';
export { loadSchemaFile, parseSchemaDocument, detectSchemaFormat } from './schema/SchemaLoader.js';
export type { SchemaFileFormat } from './schema/SchemaLoader.js';

// Code generation
export { C_TYPES, mapFieldKind, lookupCType } from './codegen/TypeMapper.js';
export { fillTemplate, loadTemplate, TEMPLATE_DIR } from './codegen/template.js';
export type { TemplateName } from './codegen/template.js';
export {
  generateSource,
  generateHeader,
  generateImplementation,
  generateDriver,
  splitAtHeaderGuard,
  sourceFileNames,
  headerGuardEnd,
} from './codegen/CodeGenerator.js';
export type { GeneratedSource, SourceFileNames } from './codegen/CodeGenerator.js';

// Build
export { buildParser, withParser, generateToDirectory, DEFAULT_BUILD_TIMEOUT_MS } from './build/Builder.js';
export type { BuildOptions, GeneratedFiles } from './build/Builder.js';
export { Workspace } from './build/Workspace.js';
export type { WorkspaceOptions } from './build/Workspace.js';
export {
  findCompiler,
  resolveExecutable,
  compilerArgs,
  getCompilerNotFoundMessage,
  DEFAULT_COMPILER_CANDIDATES,
  DEFAULT_COMPILER_FLAGS,
} from './build/Toolchain.js';
export type { FindCompilerOptions } from './build/Toolchain.js';

// Runtime
export { ParserHandle, DEFAULT_PARSE_TIMEOUT_MS } from './runtime/ParserHandle.js';
export type { ParserHandleOptions, ExecuteOptions } from './runtime/ParserHandle.js';
export { ProcessParser } from './runtime/ProcessParser.js';
export type { ProcessParserOptions } from './runtime/ProcessParser.js';
export { WorkerParser, spawnWorker, DEFAULT_SHUTDOWN_GRACE_MS } from './runtime/WorkerParser.js';
export type { WorkerParserOptions, WorkerProcess, SpawnWorker } from './runtime/WorkerParser.js';
export { decodeResult, coerceToken, normalizeOutput } from './runtime/ResultDecoder.js';
export { encodeFrame, FrameReader } from './runtime/framing.js';
export {
  SUCCESS_SENTINEL,
  FAILURE_SENTINEL,
  FAILURE_LINE,
  FIELD_DELIMITER,
  SERVE_ENV,
  SERVE_ENV_VALUE,
  BOOLEAN_TRUE,
  FRAME_HEADER_BYTES,
  MAX_FRAME_BYTES,
  serveModeEnv,
  processModeEnv,
} from './runtime/protocol.js';

// Utils
export { runProcess, formatCommand } from './utils/runProcess.js';
export type { RunProcess, RunProcessOptions, ProcessOutcome } from './utils/runProcess.js';

// Shared types
export * from '@recordc/types';
