/**
 * Parser Types - contract of a built parser handle
 */

import type { ParsedRecord, RecordSchema } from './schema.js';

/**
 * How a handle talks to its artifact:
 * - process: one child process per document (`<artifact> <document>`)
 * - worker: one long-lived serve-mode artifact (`RECORDC_SERVE=1`) fed length-prefixed frames
 */
export const PARSER_BACKENDS = ['process', 'worker'] as const;

export type ParserBackend = (typeof PARSER_BACKENDS)[number];

export function isParserBackend(value: unknown): value is ParserBackend {
  return typeof value === 'string' && PARSER_BACKENDS.some((backend) => backend === value);
}

/**
 * Handle life cycle. There is no way back from `closed`.
 */
export type ParserState = 'ready' | 'closed';

export interface ParseCallOptions {
  /** Upper bound for this call in ms. Overrides the handle default; 0 disables it. */
  timeoutMs?: number;
  /** Cancels the call; the artifact process is killed. */
  signal?: AbortSignal;
}

export interface CompiledParser {
  readonly schema: RecordSchema;
  readonly backend: ParserBackend;
  /** Absolute path of the compiled executable */
  readonly artifactPath: string;
  readonly state: ParserState;

  /**
   * Parse one JSON document. Rejects with a ParseError; the handle stays usable.
   */
  parse(document: string, options?: ParseCallOptions): Promise<ParsedRecord>;

  /**
   * Wait for in-flight calls, stop the backend and remove the workspace.
   * Idempotent: every call returns the same promise.
   */
  close(): Promise<void>;
}
