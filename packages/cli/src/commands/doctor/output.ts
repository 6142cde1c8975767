/**
 * Output formatting for `recordc doctor`
 */

import { PROTOCOL_VERSION, RECORDC_VERSION } from '@recordc/core';
import type { CheckStatus, DoctorCheckResult, DoctorReport } from './types.js';

type Color = 'green' | 'red' | 'yellow' | 'dim';

const ANSI: Record<Color, string> = {
  green: '\x1b[32m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  dim: '\x1b[2m',
};
const RESET = '\x1b[0m';

function paint(color: Color, text: string): string {
  return `${ANSI[color]}${text}${RESET}`;
}

const STATUS_ICONS: Record<CheckStatus, string> = {
  pass: paint('green', '✓'),
  warn: paint('yellow', '⚠'),
  fail: paint('red', '✗'),
  skip: paint('dim', '○'),
};

export interface DoctorSummary {
  failures: number;
  warnings: number;
}

export function summarize(checks: readonly DoctorCheckResult[]): DoctorSummary {
  let failures = 0;
  let warnings = 0;
  for (const check of checks) {
    if (check.status === 'fail') failures++;
    else if (check.status === 'warn') warnings++;
  }
  return { failures, warnings };
}

/** 1 on any failure, 2 when there are only warnings */
export function exitCodeFor(summary: DoctorSummary): number {
  if (summary.failures > 0) return 1;
  return summary.warnings > 0 ? 2 : 0;
}

function formatDetail(value: unknown): string {
  if (Array.isArray(value)) return value.map(String).join(' ');
  return typeof value === 'string' ? value : JSON.stringify(value);
}

export function formatCheck(result: DoctorCheckResult, verbose: boolean): string {
  const lines = [`${STATUS_ICONS[result.status]} ${result.message}`];

  if (result.recommendation) {
    lines.push(`  ${paint('dim', '→')} ${result.recommendation}`);
  }

  if (verbose && result.details) {
    for (const [key, value] of Object.entries(result.details)) {
      lines.push(paint('dim', `    ${key}: ${formatDetail(value)}`));
    }
  }

  return lines.join('\n');
}

export function formatSummary(summary: DoctorSummary): string {
  if (summary.failures > 0) {
    return paint('red', `Status: ${summary.failures} error(s), ${summary.warnings} warning(s)`);
  }
  if (summary.warnings > 0) {
    return paint('yellow', `Status: ${summary.warnings} warning(s)`);
  }
  return paint('green', 'Status: All checks passed');
}

/**
 * Quiet mode drops the heading and every passing check; the summary always prints.
 */
export function formatReport(
  checks: readonly DoctorCheckResult[],
  options: { quiet?: boolean; verbose?: boolean }
): string {
  const heading = options.quiet ? [] : ['Checking recordc setup...', ''];
  const shown = options.quiet ? checks.filter((check) => check.status !== 'pass') : checks;

  return [
    ...heading,
    ...shown.map((check) => formatCheck(check, options.verbose ?? false)),
    '',
    formatSummary(summarize(checks)),
  ].join('\n');
}

export function buildJsonReport(checks: DoctorCheckResult[], projectPath: string): DoctorReport {
  const { failures, warnings } = summarize(checks);
  const cli = checks.find((check) => check.name === 'versions')?.details?.cli;

  return {
    status: failures > 0 ? 'error' : warnings > 0 ? 'warning' : 'healthy',
    timestamp: new Date().toISOString(),
    project: projectPath,
    checks,
    recommendations: checks.flatMap((check) => (check.recommendation ? [check.recommendation] : [])),
    versions: {
      cli: typeof cli === 'string' ? cli : 'unknown',
      core: RECORDC_VERSION,
      protocol: PROTOCOL_VERSION,
    },
  };
}
