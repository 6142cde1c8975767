/**
 * runProcess - spawn a command and collect its combined output.
 *
 * Never rejects: every way a run can end is a ProcessOutcome, and callers map
 * outcomes onto their own error codes.
 */

import { spawn, type ChildProcess } from 'child_process';

export interface RunProcessOptions {
  cwd?: string;
  /** Kill the process after this many ms; 0 or undefined means no limit */
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Child environment; inherited when omitted */
  env?: NodeJS.ProcessEnv;
}

export type ProcessOutcome =
  | { status: 'exited'; exitCode: number | null; signal: NodeJS.Signals | null; output: string }
  | { status: 'spawn-failed'; error: Error }
  | { status: 'timed-out'; output: string }
  | { status: 'aborted'; output: string };

export type RunProcess = (
  command: string,
  args: readonly string[],
  options?: RunProcessOptions
) => Promise<ProcessOutcome>;

export const runProcess: RunProcess = (command, args, options = {}) => {
  const { cwd, timeoutMs, signal, env } = options;

  return new Promise<ProcessOutcome>((resolve) => {
    if (signal?.aborted) {
      resolve({ status: 'aborted', output: '' });
      return;
    }

    let child: ChildProcess;
    try {
      child = spawn(command, [...args], { cwd, env, stdio: ['ignore', 'pipe', 'pipe'] });
    } catch (err) {
      resolve({ status: 'spawn-failed', error: err instanceof Error ? err : new Error(String(err)) });
      return;
    }

    // stdout and stderr share one buffer so the output keeps its interleaving
    const chunks: Buffer[] = [];
    let stopReason: 'timed-out' | 'aborted' | null = null;
    let settled = false;

    const stop = (reason: 'timed-out' | 'aborted'): void => {
      stopReason ??= reason;
      child.kill('SIGKILL');
    };

    const timer = timeoutMs !== undefined && timeoutMs > 0
      ? setTimeout(() => stop('timed-out'), timeoutMs)
      : null;
    const onAbort = (): void => stop('aborted');
    signal?.addEventListener('abort', onAbort, { once: true });

    const finish = (outcome: ProcessOutcome): void => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      resolve(outcome);
    };

    child.stdout?.on('data', (chunk: Buffer) => chunks.push(chunk));
    child.stderr?.on('data', (chunk: Buffer) => chunks.push(chunk));

    child.on('error', (error: Error) => {
      finish({ status: 'spawn-failed', error });
    });

    child.on('close', (exitCode: number | null, exitSignal: NodeJS.Signals | null) => {
      const output = Buffer.concat(chunks).toString('utf-8');
      if (stopReason) {
        finish({ status: stopReason, output });
      } else {
        finish({ status: 'exited', exitCode, signal: exitSignal, output });
      }
    });
  });
};

/**
 * One-line rendering of a command for logs
 */
export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args].map((part) => (/[\s"']/.test(part) ? JSON.stringify(part) : part)).join(' ');
}
