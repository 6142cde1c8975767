/**
 * Toolchain - locating and invoking the C compiler.
 *
 * Search order for the compiler:
 * 1. Explicit command (option or config `compiler.command`)
 * 2. RECORDC_CC environment variable
 * 3. CC environment variable
 * 4. cc, gcc, clang on PATH
 */

import { accessSync, constants, statSync } from 'fs';
import { delimiter, isAbsolute, join } from 'path';

export const DEFAULT_COMPILER_CANDIDATES = ['cc', 'gcc', 'clang'] as const;

export const DEFAULT_COMPILER_FLAGS: readonly string[] = ['-O2', '-std=c99'];

export interface FindCompilerOptions {
  explicitCommand?: string;
  /** Defaults to process.env */
  env?: NodeJS.ProcessEnv;
  /** Internal: dependency injection for testing */
  _deps?: {
    isExecutable?: (filePath: string) => boolean;
  };
}

function isExecutableFile(filePath: string): boolean {
  try {
    if (!statSync(filePath).isFile()) return false;
    accessSync(filePath, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolve a command name (or path) to an executable on PATH.
 */
export function resolveExecutable(
  command: string,
  env: NodeJS.ProcessEnv = process.env,
  isExecutable: (filePath: string) => boolean = isExecutableFile
): string | null {
  if (command.includes('/') || isAbsolute(command)) {
    return isExecutable(command) ? command : null;
  }

  const searchPath = env.PATH ?? '';
  for (const dir of searchPath.split(delimiter)) {
    if (!dir) continue;
    const candidate = join(dir, command);
    if (isExecutable(candidate)) {
      return candidate;
    }
  }
  return null;
}

/**
 * Find the C compiler to use. Returns null when nothing is found.
 *
 * An explicit command that does not resolve is not replaced by a fallback.
 */
export function findCompiler(options: FindCompilerOptions = {}): string | null {
  const env = options.env ?? process.env;
  const isExecutable = options._deps?.isExecutable ?? isExecutableFile;

  if (options.explicitCommand) {
    return resolveExecutable(options.explicitCommand, env, isExecutable);
  }

  for (const variable of ['RECORDC_CC', 'CC'] as const) {
    const value = env[variable]?.trim();
    if (value) {
      const resolved = resolveExecutable(value, env, isExecutable);
      if (resolved) return resolved;
    }
  }

  for (const candidate of DEFAULT_COMPILER_CANDIDATES) {
    const resolved = resolveExecutable(candidate, env, isExecutable);
    if (resolved) return resolved;
  }

  return null;
}

/**
 * Arguments for compiling the driver and implementation into one executable.
 */
export function compilerArgs(
  flags: readonly string[],
  outputPath: string,
  sources: readonly string[]
): string[] {
  return [...flags, '-o', outputPath, ...sources];
}

export function getCompilerNotFoundMessage(): string {
  return `No C compiler found

Options:
1. Install one (gcc or clang) and make sure it is on PATH

2. Point recordc at it:
   export RECORDC_CC=/path/to/cc

3. Add to .recordc/config.yaml:
   compiler:
     command: /path/to/cc
`;
}
