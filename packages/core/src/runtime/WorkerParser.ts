/**
 * WorkerParser - one long-lived artifact process serving many documents.
 *
 * The artifact runs in serve mode (RECORDC_SERVE=1) and exchanges length-prefixed frames
 * (see framing.ts) over stdin/stdout. Requests are answered strictly in order,
 * so replies are matched to a FIFO queue.
 *
 * Lifecycle:
 * - the worker starts lazily on the first parse
 * - a timeout or abort kills it and fails every queued request
 * - the next parse starts a fresh one
 * - shutdown() closes stdin and waits for exit, killing it after a grace period
 */

import { spawn } from 'child_process';
import type { Readable, Writable } from 'stream';
import { ParseError } from '../errors/RecordcError.js';
import { serveModeEnv } from './protocol.js';
import { encodeFrame, FrameReader } from './framing.js';
import { ParserHandle, type ExecuteOptions, type ParserHandleOptions } from './ParserHandle.js';

/**
 * The part of ChildProcess the worker backend relies on.
 */
export interface WorkerProcess {
  readonly pid?: number;
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  on(event: 'error', listener: (error: Error) => void): this;
}

export type SpawnWorker = (command: string, args: readonly string[], env: NodeJS.ProcessEnv) => WorkerProcess;

export const DEFAULT_SHUTDOWN_GRACE_MS = 2_000;

export const spawnWorker: SpawnWorker = (command, args, env) => spawn(command, [...args], { env });

export interface WorkerParserOptions extends ParserHandleOptions {
  shutdownGraceMs?: number;
  /** Internal: dependency injection for testing */
  _deps?: {
    spawnWorker?: SpawnWorker;
  };
}

interface PendingRequest {
  resolve(payload: string): void;
  reject(error: Error): void;
}

export class WorkerParser extends ParserHandle {
  readonly backend = 'worker' as const;
  private readonly spawnWorker: SpawnWorker;
  private readonly shutdownGraceMs: number;
  private worker: WorkerProcess | null = null;
  private reader = new FrameReader();
  private pending: PendingRequest[] = [];
  private restarts = 0;

  constructor(options: WorkerParserOptions) {
    super(options);
    this.spawnWorker = options._deps?.spawnWorker ?? spawnWorker;
    this.shutdownGraceMs = options.shutdownGraceMs ?? DEFAULT_SHUTDOWN_GRACE_MS;
  }

  /** Times a worker was killed after a timeout or abort */
  get restartCount(): number {
    return this.restarts;
  }

  get running(): boolean {
    return this.worker !== null;
  }

  protected execute(document: string, { timeoutMs, signal }: ExecuteOptions): Promise<string> {
    const schema = this.schema.name;

    if (signal?.aborted) {
      return Promise.reject(new ParseError(`Parse for ${schema} was aborted`, 'ERR_PARSE_ABORTED', { schema }));
    }

    let worker: WorkerProcess;
    try {
      worker = this.ensureWorker();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return Promise.reject(
        new ParseError(`Cannot start parser worker ${this.artifactPath}: ${message}`, 'ERR_PARSE_SPAWN_FAILED', {
          schema,
          artifactPath: this.artifactPath,
        })
      );
    }

    return new Promise<string>((resolve, reject) => {
      let timer: NodeJS.Timeout | null = null;

      const cleanup = (): void => {
        if (timer) clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      };

      const request: PendingRequest = {
        resolve: (payload) => {
          cleanup();
          resolve(payload);
        },
        reject: (error) => {
          cleanup();
          reject(error);
        },
      };

      const onAbort = (): void => {
        this.abandon(worker, request, new ParseError(`Parse for ${schema} was aborted`, 'ERR_PARSE_ABORTED', { schema }));
      };

      if (timeoutMs > 0) {
        timer = setTimeout(() => {
          this.abandon(
            worker,
            request,
            new ParseError(
              `Parser worker for ${schema} did not answer within ${timeoutMs}ms`,
              'ERR_PARSE_TIMEOUT',
              { schema, timeoutMs },
              'Raise parseTimeoutMs or pass a larger timeoutMs to parse()'
            )
          );
        }, timeoutMs);
      }
      signal?.addEventListener('abort', onAbort, { once: true });

      this.pending.push(request);
      worker.stdin.write(encodeFrame(document));
    });
  }

  protected async shutdown(): Promise<void> {
    const worker = this.worker;
    if (!worker) return;

    const exited = new Promise<void>((resolve) => {
      worker.on('exit', () => resolve());
    });
    const timer = setTimeout(() => {
      this.logger.warn('Parser worker ignored shutdown, killing it', { schema: this.schema.name, pid: worker.pid });
      worker.kill('SIGKILL');
    }, this.shutdownGraceMs);

    worker.stdin.end();
    await exited;
    clearTimeout(timer);
  }

  private ensureWorker(): WorkerProcess {
    if (this.worker) return this.worker;

    const schema = this.schema.name;
    const worker = this.spawnWorker(this.artifactPath, [], serveModeEnv(process.env));
    this.worker = worker;
    this.reader = new FrameReader();

    worker.stdout.on('data', (chunk: Buffer) => this.onData(worker, chunk));
    worker.stderr?.on('data', (chunk: Buffer) => {
      this.logger.debug('Parser worker stderr', { schema, output: chunk.toString('utf-8') });
    });
    // EPIPE after the worker died; the exit handler fails the requests
    worker.stdin.on('error', (error: Error) => {
      this.logger.debug('Parser worker stdin error', { schema, error: error.message });
    });
    worker.on('error', (error) => {
      this.detach(
        worker,
        new ParseError(`Parser worker failed: ${error.message}`, 'ERR_PARSE_SPAWN_FAILED', {
          schema,
          artifactPath: this.artifactPath,
        })
      );
    });
    worker.on('exit', (code, signal) => {
      this.logger.debug('Parser worker exited', { schema, pid: worker.pid, code, signal });
      this.detach(
        worker,
        new ParseError(`Parser worker exited (code ${code}, signal ${signal})`, 'ERR_WORKER_EXITED', {
          schema,
          exitCode: code,
        })
      );
    });

    this.logger.info('Started parser worker', { schema, pid: worker.pid });
    return worker;
  }

  private onData(worker: WorkerProcess, chunk: Buffer): void {
    if (worker !== this.worker) return;

    for (const payload of this.reader.push(chunk)) {
      const request = this.pending.shift();
      if (!request) {
        this.logger.warn('Parser worker sent an unrequested reply', { schema: this.schema.name });
        continue;
      }
      request.resolve(payload);
    }
  }

  /**
   * Fail one request with its own error, then kill the worker and fail
   * everything queued behind it.
   */
  private abandon(worker: WorkerProcess, request: PendingRequest, error: ParseError): void {
    const index = this.pending.indexOf(request);
    if (index === -1) return;

    this.pending.splice(index, 1);
    request.reject(error);

    this.restarts++;
    this.logger.warn('Killing parser worker', { schema: this.schema.name, pid: worker.pid, reason: error.code });
    this.detach(
      worker,
      new ParseError('Parser worker was killed before answering', 'ERR_WORKER_EXITED', { schema: this.schema.name })
    );
    worker.kill('SIGKILL');
  }

  private detach(worker: WorkerProcess, error: ParseError): void {
    if (this.worker !== worker) return;

    this.worker = null;
    this.reader = new FrameReader();
    const pending = this.pending;
    this.pending = [];
    for (const request of pending) {
      request.reject(error);
    }
  }
}
