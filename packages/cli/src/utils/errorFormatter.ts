/**
 * Standardized error formatting for CLI commands
 *
 * Format:
 *   ✗ Main error message (1 line, concise)
 *
 *   → Next action 1
 *   → Next action 2
 */

import { RecordcError } from '@recordc/core';

/**
 * Print a standardized error message and exit.
 *
 * @param title - Main error message (should be under 80 chars)
 * @param nextSteps - Optional array of actionable suggestions
 *
 * @example
 * exitWithError('No C compiler found', [
 *   'Run: recordc doctor'
 * ]);
 */
export function exitWithError(title: string, nextSteps?: string[]): never {
  console.error(`✗ ${title}`);

  if (nextSteps && nextSteps.length > 0) {
    console.error('');
    for (const step of nextSteps) {
      console.error(`→ ${step}`);
    }
  }

  process.exit(1);
}

/**
 * Title and next steps for any thrown value. Compiler output is already part
 * of a BuildError's message.
 */
export function describeError(err: unknown): { title: string; nextSteps: string[] } {
  if (err instanceof RecordcError) {
    return {
      title: `${err.code}: ${err.message}`,
      nextSteps: err.suggestion ? [err.suggestion] : [],
    };
  }
  return {
    title: err instanceof Error ? err.message : String(err),
    nextSteps: [],
  };
}

export function exitWithRecordcError(err: unknown): never {
  const { title, nextSteps } = describeError(err);
  exitWithError(title, nextSteps);
}
