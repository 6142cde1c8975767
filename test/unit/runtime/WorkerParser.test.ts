/**
 * WorkerParser tests
 *
 * A fake worker stands in for a serve-mode artifact: it decodes frames from
 * stdin and answers through stdout the way the compiled driver does, one
 * request at a time and in order.
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { EventEmitter } from 'events';
import { PassThrough } from 'stream';
import { existsSync, mkdtempSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  WorkerParser,
  ParseError,
  Workspace,
  FrameReader,
  encodeFrame,
  type WorkerProcess,
} from '@recordc/core';
import { MemoryLogger } from '../../helpers/MemoryLogger.js';
import { PERSON } from '../../helpers/schemas.js';

/** Reply for a document, or null to hang (and stall everything after it) */
type Responder = (document: string) => string | null;

const echo: Responder = (document) => `SUCCESS|${document}|1|true`;

class FakeWorker extends EventEmitter implements WorkerProcess {
  readonly pid = 4242;
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly received: string[] = [];
  readonly signals: (NodeJS.Signals | undefined)[] = [];
  private readonly reader = new FrameReader();
  private stalled = false;
  private exited = false;

  constructor(respond: Responder, options: { ignoreEnd?: boolean } = {}) {
    super();
    this.stdin.on('data', (chunk: Buffer) => {
      for (const document of this.reader.push(chunk)) {
        this.received.push(document);
        if (this.stalled) continue;
        const reply = respond(document);
        if (reply === null) {
          this.stalled = true;
          continue;
        }
        this.stdout.write(encodeFrame(reply));
      }
    });
    if (!options.ignoreEnd) {
      this.stdin.on('finish', () => this.exit(0, null));
    }
  }

  kill(signal?: NodeJS.Signals): boolean {
    this.signals.push(signal);
    this.exit(null, signal ?? 'SIGTERM');
    return true;
  }

  exit(code: number | null, signal: NodeJS.Signals | null): void {
    if (this.exited) return;
    this.exited = true;
    this.emit('exit', code, signal);
  }
}

function isParseError(code: string, message?: string) {
  return (err: unknown): boolean =>
    err instanceof ParseError && err.code === code && (message === undefined || err.message === message);
}

function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe('WorkerParser', () => {
  let root: string;
  let workspace: Workspace;
  let logger: MemoryLogger;
  let workers: FakeWorker[];
  let spawns: { command: string; args: readonly string[]; env: NodeJS.ProcessEnv }[];

  beforeEach(async () => {
    root = mkdtempSync(join(tmpdir(), 'recordc-worker-'));
    workspace = await Workspace.create({ root });
    logger = new MemoryLogger();
    workers = [];
    spawns = [];
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  function createParser(
    respond: Responder = echo,
    options: { ignoreEnd?: boolean; shutdownGraceMs?: number } = {}
  ): WorkerParser {
    return new WorkerParser({
      schema: PERSON,
      artifactPath: workspace.path('parser_Person'),
      workspace,
      logger,
      shutdownGraceMs: options.shutdownGraceMs,
      _deps: {
        spawnWorker: (command, args, env) => {
          spawns.push({ command, args, env });
          const worker = new FakeWorker(respond, { ignoreEnd: options.ignoreEnd });
          workers.push(worker);
          return worker;
        },
      },
    });
  }

  describe('worker start', () => {
    it('should start the worker lazily in serve mode', async () => {
      const parser = createParser();
      assert.strictEqual(parser.running, false);
      assert.strictEqual(spawns.length, 0);

      const record = await parser.parse('Ann');

      assert.deepStrictEqual(record, { name: 'Ann', age: '1', is_student: true });
      assert.strictEqual(spawns.length, 1);
      assert.strictEqual(spawns[0]?.command, workspace.path('parser_Person'));
      assert.deepStrictEqual(spawns[0]?.args, []);
      assert.strictEqual(spawns[0]?.env.RECORDC_SERVE, '1');
      assert.strictEqual(spawns[0]?.env.PATH, process.env.PATH);
      assert.strictEqual(parser.running, true);
      assert.ok(logger.messages('info').includes('Started parser worker'));
      await parser.close();
    });

    it('should report a worker that cannot be spawned', async () => {
      const parser = new WorkerParser({
        schema: PERSON,
        artifactPath: workspace.path('parser_Person'),
        workspace,
        logger,
        _deps: {
          spawnWorker: () => {
            throw new Error('spawn ENOENT');
          },
        },
      });

      await assert.rejects(
        parser.parse('{}'),
        isParseError('ERR_PARSE_SPAWN_FAILED', `Cannot start parser worker ${workspace.path('parser_Person')}: spawn ENOENT`)
      );
      assert.strictEqual(parser.running, false);
      await parser.close();
    });

    it('should fail pending requests when the worker emits an error', async () => {
      const parser = createParser(() => null);
      const parsing = parser.parse('{}');

      workers[0]?.emit('error', new Error('spawn EACCES'));

      await assert.rejects(parsing, isParseError('ERR_PARSE_SPAWN_FAILED', 'Parser worker failed: spawn EACCES'));
      assert.strictEqual(parser.running, false);
      await parser.close();
    });
  });

  describe('requests', () => {
    it('should answer concurrent requests in order from one worker', async () => {
      const parser = createParser();

      const records = await Promise.all([parser.parse('a'), parser.parse('b'), parser.parse('c')]);

      assert.deepStrictEqual(records.map((record) => record.name), ['a', 'b', 'c']);
      assert.strictEqual(spawns.length, 1);
      assert.deepStrictEqual(workers[0]?.received, ['a', 'b', 'c']);
      await parser.close();
    });

    it('should pass documents with newlines and multi-byte text intact', async () => {
      const parser = createParser();
      const document = '{\n  "name": "Zoë"\n}';

      await parser.parse(document);

      assert.deepStrictEqual(workers[0]?.received, [document]);
      await parser.close();
    });

    it('should surface a failure reply as ERR_PARSE_FAILED', async () => {
      const parser = createParser(() => 'ERROR|Failed to parse JSON');

      await assert.rejects(parser.parse('{'), isParseError('ERR_PARSE_FAILED'));
      assert.strictEqual(parser.running, true);
      await parser.close();
    });

    it('should log worker stderr at debug level', async () => {
      const parser = createParser();
      await parser.parse('a');

      workers[0]?.stderr.write('warning: something\n');
      await tick();

      const entry = logger.entries.find((e) => e.message === 'Parser worker stderr');
      assert.deepStrictEqual(entry, {
        level: 'debug',
        message: 'Parser worker stderr',
        context: { schema: 'Person', output: 'warning: something\n' },
      });
      await parser.close();
    });

    it('should warn about a reply nobody asked for', async () => {
      const parser = createParser();
      await parser.parse('a');

      workers[0]?.stdout.write(encodeFrame('SUCCESS|stray|0|false'));
      await tick();

      assert.deepStrictEqual(logger.messages('warn'), ['Parser worker sent an unrequested reply']);
      await parser.close();
    });
  });

  describe('timeouts and aborts', () => {
    it('should kill a worker that misses the deadline and fail the requests behind it', async () => {
      const parser = createParser((document) => (document === 'slow' ? null : echo(document)));

      const slow = parser.parse('slow', { timeoutMs: 20 });
      const queued = parser.parse('queued', { timeoutMs: 0 });

      await Promise.all([
        assert.rejects(slow, isParseError('ERR_PARSE_TIMEOUT', 'Parser worker for Person did not answer within 20ms')),
        assert.rejects(queued, isParseError('ERR_WORKER_EXITED', 'Parser worker was killed before answering')),
      ]);

      assert.deepStrictEqual(workers[0]?.signals, ['SIGKILL']);
      assert.strictEqual(parser.restartCount, 1);
      assert.strictEqual(parser.running, false);
      assert.deepStrictEqual(logger.messages('warn'), ['Killing parser worker']);

      const record = await parser.parse('fast');
      assert.strictEqual(record.name, 'fast');
      assert.strictEqual(spawns.length, 2);
      await parser.close();
    });

    it('should kill the worker when a call is aborted', async () => {
      const parser = createParser(() => null);
      const controller = new AbortController();

      const parsing = parser.parse('{}', { signal: controller.signal, timeoutMs: 0 });
      controller.abort();

      await assert.rejects(parsing, isParseError('ERR_PARSE_ABORTED', 'Parse for Person was aborted'));
      assert.deepStrictEqual(workers[0]?.signals, ['SIGKILL']);
      assert.strictEqual(parser.restartCount, 1);
      await parser.close();
    });

    it('should not start a worker for an already aborted call', async () => {
      const parser = createParser();
      const controller = new AbortController();
      controller.abort();

      await assert.rejects(parser.parse('{}', { signal: controller.signal }), isParseError('ERR_PARSE_ABORTED'));
      assert.strictEqual(spawns.length, 0);
      await parser.close();
    });

    it('should fail pending requests when the worker dies on its own', async () => {
      const parser = createParser(() => null);
      const parsing = parser.parse('{}', { timeoutMs: 0 });

      workers[0]?.exit(1, null);

      await assert.rejects(parsing, isParseError('ERR_WORKER_EXITED', 'Parser worker exited (code 1, signal null)'));
      assert.strictEqual(parser.restartCount, 0);
      assert.strictEqual(parser.running, false);
      await parser.close();
    });
  });

  describe('close', () => {
    it('should end stdin and wait for the worker to exit', async () => {
      const parser = createParser();
      await parser.parse('a');

      await parser.close();

      assert.deepStrictEqual(workers[0]?.signals, []);
      assert.strictEqual(existsSync(workspace.dir), false);
      await assert.rejects(parser.parse('b'), isParseError('ERR_HANDLE_CLOSED'));
    });

    it('should kill a worker that ignores the end of input', async () => {
      const parser = createParser(echo, { ignoreEnd: true, shutdownGraceMs: 20 });
      await parser.parse('a');

      await parser.close();

      assert.deepStrictEqual(workers[0]?.signals, ['SIGKILL']);
      assert.deepStrictEqual(logger.messages('warn'), ['Parser worker ignored shutdown, killing it']);
      assert.strictEqual(existsSync(workspace.dir), false);
    });

    it('should not spawn anything when closed before first use', async () => {
      const parser = createParser();
      await parser.close();
      assert.strictEqual(spawns.length, 0);
      assert.strictEqual(existsSync(workspace.dir), false);
    });
  });
});
