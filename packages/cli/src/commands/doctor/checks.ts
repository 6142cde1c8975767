/**
 * Diagnostic checks for `recordc doctor`
 *
 * - checkConfig: .recordc/config.yaml present and valid
 * - checkCompiler: a C compiler can be found
 * - checkWorkspaceRoot: build workspaces can be created
 * - checkVersions: informational
 */

import { existsSync, readFileSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { fileURLToPath } from 'url';
import {
  DEFAULT_CONFIG,
  PROTOCOL_VERSION,
  RECORDC_VERSION,
  RecordcError,
  Workspace,
  findCompiler,
  getConfigPath,
  loadConfig,
  type RecordcConfig,
} from '@recordc/core';
import type { DoctorCheckResult } from './types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * Check the config file. A missing file is fine (defaults apply); a file
 * with invalid values fails.
 */
export function checkConfig(projectPath: string): { result: DoctorCheckResult; config: RecordcConfig } {
  const configPath = getConfigPath(projectPath);

  if (!existsSync(configPath)) {
    return {
      result: {
        name: 'config',
        status: 'pass',
        message: 'No config file, using defaults',
        details: { configPath },
      },
      config: DEFAULT_CONFIG,
    };
  }

  const warnings: string[] = [];
  try {
    const config = loadConfig(projectPath, { warn: (msg: string) => warnings.push(msg) });
    if (warnings.length > 0) {
      return {
        result: {
          name: 'config',
          status: 'warn',
          message: `Config loaded with ${warnings.length} warning(s)`,
          recommendation: warnings[0],
          details: { configPath, warnings },
        },
        config,
      };
    }
    return {
      result: { name: 'config', status: 'pass', message: 'Config file is valid', details: { configPath } },
      config,
    };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return {
      result: {
        name: 'config',
        status: 'fail',
        message,
        recommendation: err instanceof RecordcError ? err.suggestion : `Fix ${configPath}`,
        details: { configPath },
      },
      config: DEFAULT_CONFIG,
    };
  }
}

export function checkCompiler(
  config: RecordcConfig,
  locate: (explicitCommand: string | undefined) => string | null = (explicitCommand) => findCompiler({ explicitCommand })
): DoctorCheckResult {
  const compiler = locate(config.compiler.command);

  if (!compiler) {
    return {
      name: 'compiler',
      status: 'fail',
      message: config.compiler.command
        ? `Configured compiler not found: ${config.compiler.command}`
        : 'No C compiler found (tried RECORDC_CC, CC, cc, gcc, clang)',
      recommendation: 'Install gcc or clang, or set compiler.command in .recordc/config.yaml',
    };
  }

  return {
    name: 'compiler',
    status: 'pass',
    message: `C compiler: ${compiler}`,
    details: { compiler, flags: config.compiler.flags },
  };
}

export async function checkWorkspaceRoot(config: RecordcConfig, projectPath: string): Promise<DoctorCheckResult> {
  const root = config.workspaceRoot !== undefined ? resolve(projectPath, config.workspaceRoot) : undefined;

  try {
    const workspace = await Workspace.create({ root, prefix: 'recordc-doctor-' });
    await workspace.dispose();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return {
      name: 'workspace',
      status: 'fail',
      message,
      recommendation: 'Point workspaceRoot in .recordc/config.yaml at a writable directory',
    };
  }

  return {
    name: 'workspace',
    status: 'pass',
    message: `Build workspaces: ${root ?? 'system temp directory'}`,
  };
}

function readCliVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(join(__dirname, '..', '..', '..', 'package.json'), 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch {
    // reported as unknown below
  }
  return 'unknown';
}

export function checkVersions(): DoctorCheckResult {
  const cli = readCliVersion();

  return {
    name: 'versions',
    status: 'pass',
    message: `CLI ${cli}, core ${RECORDC_VERSION}, protocol v${PROTOCOL_VERSION}`,
    details: { cli, core: RECORDC_VERSION, protocol: PROTOCOL_VERSION },
  };
}
