/**
 * ParserHandle - shared life cycle of a built parser.
 *
 * States: ready → closed. close() flips the state at once, then waits for
 * every in-flight parse to settle before the backend is stopped and the
 * workspace removed, so files never disappear under a running call.
 */

import type {
  CompiledParser,
  Logger,
  ParseCallOptions,
  ParsedRecord,
  ParserBackend,
  ParserState,
  RecordSchema,
} from '@recordc/types';
import { ParseError } from '../errors/RecordcError.js';
import type { Workspace } from '../build/Workspace.js';
import { decodeResult } from './ResultDecoder.js';

export const DEFAULT_PARSE_TIMEOUT_MS = 10_000;

export interface ParserHandleOptions {
  schema: RecordSchema;
  artifactPath: string;
  workspace: Workspace;
  /** Per-call limit when the caller gives none; 0 disables it */
  parseTimeoutMs?: number;
  logger: Logger;
}

export interface ExecuteOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export abstract class ParserHandle implements CompiledParser {
  abstract readonly backend: ParserBackend;
  readonly schema: RecordSchema;
  readonly artifactPath: string;
  protected readonly logger: Logger;
  protected readonly parseTimeoutMs: number;
  private readonly workspace: Workspace;
  private readonly inFlight = new Set<Promise<string>>();
  private closing: Promise<void> | null = null;

  constructor(options: ParserHandleOptions) {
    this.schema = options.schema;
    this.artifactPath = options.artifactPath;
    this.workspace = options.workspace;
    this.logger = options.logger;
    this.parseTimeoutMs = options.parseTimeoutMs ?? DEFAULT_PARSE_TIMEOUT_MS;
  }

  get state(): ParserState {
    return this.closing === null ? 'ready' : 'closed';
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  /**
   * Run the artifact on one document and return its raw output.
   * Implementations reject with ParseError.
   */
  protected abstract execute(document: string, options: ExecuteOptions): Promise<string>;

  /**
   * Stop whatever the backend keeps running. Called once, after the drain.
   */
  protected abstract shutdown(): Promise<void>;

  async parse(document: string, options: ParseCallOptions = {}): Promise<ParsedRecord> {
    if (this.closing !== null) {
      throw new ParseError(
        `Parser for ${this.schema.name} is closed`,
        'ERR_HANDLE_CLOSED',
        { schema: this.schema.name },
        'Build a new parser'
      );
    }

    const call = this.execute(document, {
      timeoutMs: options.timeoutMs ?? this.parseTimeoutMs,
      signal: options.signal,
    });
    this.inFlight.add(call);

    try {
      const output = await call;
      this.logger.debug('Parser output', { schema: this.schema.name, backend: this.backend, output });
      return decodeResult(output, this.schema.fields);
    } finally {
      this.inFlight.delete(call);
    }
  }

  close(): Promise<void> {
    this.closing ??= this.release();
    return this.closing;
  }

  private async release(): Promise<void> {
    if (this.inFlight.size > 0) {
      this.logger.debug('Waiting for in-flight parses', { schema: this.schema.name, count: this.inFlight.size });
    }
    await Promise.allSettled(this.inFlight);

    try {
      await this.shutdown();
    } finally {
      await this.workspace.dispose();
      this.logger.info('Parser closed', { schema: this.schema.name, backend: this.backend });
    }
  }
}
