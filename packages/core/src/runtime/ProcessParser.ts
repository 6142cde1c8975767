/**
 * ProcessParser - one artifact process per parse call.
 *
 * The document travels as the single command-line argument, so its size is
 * bounded by the platform's argument limit (ARG_MAX). Use the worker backend
 * for large documents. An argument cannot carry a NUL byte, so documents
 * containing one are rejected before anything is spawned.
 */

import { runProcess as defaultRunProcess, type RunProcess } from '../utils/runProcess.js';
import { ParseError } from '../errors/RecordcError.js';
import { processModeEnv } from './protocol.js';
import { ParserHandle, type ExecuteOptions, type ParserHandleOptions } from './ParserHandle.js';

export interface ProcessParserOptions extends ParserHandleOptions {
  /** Internal: dependency injection for testing */
  _deps?: {
    runProcess?: RunProcess;
  };
}

export class ProcessParser extends ParserHandle {
  readonly backend = 'process' as const;
  private readonly runProcess: RunProcess;

  constructor(options: ProcessParserOptions) {
    super(options);
    this.runProcess = options._deps?.runProcess ?? defaultRunProcess;
  }

  protected async execute(document: string, { timeoutMs, signal }: ExecuteOptions): Promise<string> {
    const schema = this.schema.name;
    if (document.includes('\0')) {
      throw new ParseError('Parser rejected the document (embedded NUL byte)', 'ERR_PARSE_FAILED', { schema });
    }

    const outcome = await this.runProcess(this.artifactPath, [document], {
      timeoutMs,
      signal,
      env: processModeEnv(process.env),
    });

    switch (outcome.status) {
      case 'spawn-failed':
        throw new ParseError(
          `Cannot start parser ${this.artifactPath}: ${outcome.error.message}`,
          'ERR_PARSE_SPAWN_FAILED',
          { schema, artifactPath: this.artifactPath }
        );
      case 'timed-out':
        throw new ParseError(
          `Parser for ${schema} did not finish within ${timeoutMs}ms`,
          'ERR_PARSE_TIMEOUT',
          { schema, timeoutMs, output: outcome.output },
          'Raise parseTimeoutMs or pass a larger timeoutMs to parse()'
        );
      case 'aborted':
        throw new ParseError(`Parse for ${schema} was aborted`, 'ERR_PARSE_ABORTED', { schema });
      case 'exited':
        if (outcome.exitCode !== 0) {
          this.logger.debug('Parser exited with failure', {
            schema,
            exitCode: outcome.exitCode,
            signal: outcome.signal,
            output: outcome.output,
          });
          throw new ParseError(
            `Parser rejected the document (exit code ${outcome.exitCode ?? outcome.signal})`,
            'ERR_PARSE_FAILED',
            { schema, exitCode: outcome.exitCode, output: outcome.output }
          );
        }
        return outcome.output;
    }
  }

  protected async shutdown(): Promise<void> {
    // nothing outlives a call
  }
}
