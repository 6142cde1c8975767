/**
 * RecordcError - Error hierarchy for recordc
 *
 * Error types:
 * - SchemaError: schema violates a validation rule (fatal, before any codegen)
 * - SchemaFileError: schema file unreadable or not shaped like a schema (fatal)
 * - BuildError: workspace, source write, template or compiler failure (fatal)
 * - ParseError: one parse call failed; the handle stays usable (error)
 * - ConfigError: .recordc/config.yaml holds invalid values (fatal)
 */

/**
 * Context for error reporting
 */
export interface ErrorContext {
  schema?: string;
  field?: string;
  filePath?: string;
  [key: string]: unknown;
}

export type ErrorSeverity = 'fatal' | 'error' | 'warning';

/**
 * JSON representation of RecordcError
 */
export interface RecordcErrorJSON {
  code: string;
  severity: ErrorSeverity;
  message: string;
  context: ErrorContext;
  suggestion?: string;
}

/**
 * Abstract base class for all recordc errors.
 */
export abstract class RecordcError extends Error {
  abstract readonly code: string;
  abstract readonly severity: ErrorSeverity;
  readonly context: ErrorContext;
  readonly suggestion?: string;

  constructor(message: string, context: ErrorContext = {}, suggestion?: string) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    this.suggestion = suggestion;

    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): RecordcErrorJSON {
    return {
      code: this.code,
      severity: this.severity,
      message: this.message,
      context: this.context,
      suggestion: this.suggestion,
    };
  }
}

// =============================================================================
// Schema validation
// =============================================================================

/**
 * Codes in rule order: the first violated rule wins.
 */
export const SCHEMA_ERROR_CODES = [
  'ERR_SCHEMA_EMPTY_NAME',
  'ERR_SCHEMA_INVALID_NAME',
  'ERR_SCHEMA_NO_FIELDS',
  'ERR_SCHEMA_EMPTY_FIELD_NAME',
  'ERR_SCHEMA_INVALID_FIELD_NAME',
  'ERR_SCHEMA_DUPLICATE_FIELD',
  'ERR_SCHEMA_EMPTY_TYPE',
  'ERR_SCHEMA_UNSUPPORTED_TYPE',
] as const;

export type SchemaErrorCode = (typeof SCHEMA_ERROR_CODES)[number];

export class SchemaError extends RecordcError {
  readonly code: SchemaErrorCode;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: SchemaErrorCode, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Codes: ERR_SCHEMA_FILE_UNREADABLE, ERR_SCHEMA_FILE_INVALID
 */
export type SchemaFileErrorCode = 'ERR_SCHEMA_FILE_UNREADABLE' | 'ERR_SCHEMA_FILE_INVALID';

export class SchemaFileError extends RecordcError {
  readonly code: SchemaFileErrorCode;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: SchemaFileErrorCode, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

// =============================================================================
// Build
// =============================================================================

export type BuildErrorCode =
  | 'ERR_BUILD_WORKSPACE_CREATE'
  | 'ERR_BUILD_SOURCE_WRITE'
  | 'ERR_BUILD_TEMPLATE'
  | 'ERR_BUILD_COMPILER_NOT_FOUND'
  | 'ERR_BUILD_COMPILER_FAILED'
  | 'ERR_BUILD_TIMEOUT';

/**
 * Build error - fatal to one build attempt, never retried internally.
 *
 * ERR_BUILD_COMPILER_FAILED carries the compiler's combined output in
 * `context.toolOutput`.
 */
export class BuildError extends RecordcError {
  readonly code: BuildErrorCode;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: BuildErrorCode, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

// =============================================================================
// Parse
// =============================================================================

export type ParseErrorCode =
  | 'ERR_PARSE_SPAWN_FAILED'
  | 'ERR_PARSE_MALFORMED_OUTPUT'
  | 'ERR_PARSE_FAILED'
  | 'ERR_PARSE_TIMEOUT'
  | 'ERR_PARSE_ABORTED'
  | 'ERR_HANDLE_CLOSED'
  | 'ERR_WORKER_EXITED';

/**
 * Parse error - scoped to one call. Raw artifact output, when there is any,
 * is kept in `context.output`.
 */
export class ParseError extends RecordcError {
  readonly code: ParseErrorCode;
  readonly severity = 'error' as const;

  constructor(message: string, code: ParseErrorCode, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

// =============================================================================
// Config
// =============================================================================

export class ConfigError extends RecordcError {
  readonly code = 'ERR_CONFIG_INVALID' as const;
  readonly severity = 'fatal' as const;
}
