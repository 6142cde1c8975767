/**
 * Doctor command - Diagnose recordc setup issues
 *
 * Checks (in order):
 * 1. Config validity (.recordc/config.yaml, optional)
 * 2. C compiler discovery
 * 3. Build workspace root is writable
 * 4. Version information
 */

import { Command } from 'commander';
import { resolve } from 'path';
import { checkCompiler, checkConfig, checkVersions, checkWorkspaceRoot } from './doctor/checks.js';
import { buildJsonReport, exitCodeFor, formatReport, summarize } from './doctor/output.js';
import type { DoctorOptions, DoctorCheckResult } from './doctor/types.js';

export const doctorCommand = new Command('doctor')
  .description('Diagnose recordc setup issues')
  .option('-p, --project <path>', 'Project path', '.')
  .option('-j, --json', 'Output as JSON')
  .option('-q, --quiet', 'Only show failures')
  .option('-v, --verbose', 'Show detailed diagnostics')
  .addHelpText('after', `
Examples:
  recordc doctor                 Run all diagnostic checks
  recordc doctor --verbose       Show detailed diagnostics
  recordc doctor --json          Output diagnostics as JSON
`)
  .action(async (options: DoctorOptions) => {
    const projectPath = resolve(options.project);
    const checks: DoctorCheckResult[] = [];

    const { result: configCheck, config } = checkConfig(projectPath);
    checks.push(configCheck);
    checks.push(checkCompiler(config));
    checks.push(await checkWorkspaceRoot(config, projectPath));
    checks.push(checkVersions());

    if (options.json) {
      console.log(JSON.stringify(buildJsonReport(checks, projectPath), null, 2));
    } else {
      console.log(formatReport(checks, options));
    }

    process.exitCode = exitCodeFor(summarize(checks));
  });
