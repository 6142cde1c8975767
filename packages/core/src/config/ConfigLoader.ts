import { readFileSync, existsSync } from 'fs';
import { join, resolve } from 'path';
import { parse as parseYAML } from 'yaml';
import { isParserBackend, type LogLevel, type Logger, type ParserBackend } from '@recordc/types';
import { ConfigError } from '../errors/RecordcError.js';
import { isLogLevel } from '../logging/Logger.js';
import { DEFAULT_COMPILER_FLAGS } from '../build/Toolchain.js';
import { DEFAULT_BUILD_TIMEOUT_MS, type BuildOptions } from '../build/Builder.js';
import { DEFAULT_PARSE_TIMEOUT_MS } from '../runtime/ParserHandle.js';
import { RECORDC_VERSION, getSchemaVersion } from '../version.js';

export const CONFIG_DIR = '.recordc';
export const CONFIG_FILE = 'config.yaml';

export interface CompilerConfig {
  /** Command or path; discovered (RECORDC_CC, CC, cc/gcc/clang) when omitted */
  command?: string;
  flags: string[];
  timeoutMs: number;
}

/**
 * recordc configuration.
 *
 * YAML Location: .recordc/config.yaml
 *
 * ```yaml
 * version: "0.1.0"
 * backend: worker
 * parseTimeoutMs: 5000
 * compiler:
 *   command: gcc
 *   flags: ["-O2", "-std=c99"]
 *   timeoutMs: 60000
 * workspaceRoot: .recordc/build
 * logLevel: info
 * logFile: .recordc/recordc.log
 * ```
 */
export interface RecordcConfig {
  /**
   * Config schema version (major.minor.patch). Checked against the running
   * recordc when present.
   */
  version?: string;
  backend: ParserBackend;
  /** Default per-call parse limit; 0 disables it */
  parseTimeoutMs: number;
  compiler: CompilerConfig;
  /** Relative paths resolve against the project directory */
  workspaceRoot?: string;
  logLevel: LogLevel;
  logFile?: string;
}

type PartialConfig = Partial<Omit<RecordcConfig, 'compiler'>> & { compiler?: Partial<CompilerConfig> };

export const DEFAULT_CONFIG: RecordcConfig = {
  version: getSchemaVersion(RECORDC_VERSION),
  backend: 'process',
  parseTimeoutMs: DEFAULT_PARSE_TIMEOUT_MS,
  compiler: {
    flags: [...DEFAULT_COMPILER_FLAGS],
    timeoutMs: DEFAULT_BUILD_TIMEOUT_MS,
  },
  logLevel: 'warnings',
};

const KNOWN_KEYS = new Set(['version', 'backend', 'parseTimeoutMs', 'compiler', 'workspaceRoot', 'logLevel', 'logFile']);
const KNOWN_COMPILER_KEYS = new Set(['command', 'flags', 'timeoutMs']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

export function getConfigPath(projectPath: string): string {
  return join(projectPath, CONFIG_DIR, CONFIG_FILE);
}

/**
 * Load recordc config from a project directory.
 *
 * - No config file: DEFAULT_CONFIG
 * - YAML that does not parse: warning, DEFAULT_CONFIG
 * - Values of the wrong shape: THROWS ConfigError
 */
export function loadConfig(
  projectPath: string,
  logger: { warn: (msg: string) => void } = console
): RecordcConfig {
  const configPath = getConfigPath(projectPath);

  if (!existsSync(configPath)) {
    return mergeConfig(DEFAULT_CONFIG, {});
  }

  let parsed: unknown;
  try {
    parsed = parseYAML(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    logger.warn(`Failed to parse ${CONFIG_FILE}: ${error.message}`);
    logger.warn('Using default configuration');
    return mergeConfig(DEFAULT_CONFIG, {});
  }

  // empty file
  if (parsed === null || parsed === undefined) {
    return mergeConfig(DEFAULT_CONFIG, {});
  }

  return mergeConfig(DEFAULT_CONFIG, validateConfig(parsed, configPath, logger));
}

/**
 * Check a parsed config document and narrow it to its typed form.
 * THROWS ConfigError on the first invalid value.
 */
export function validateConfig(
  raw: unknown,
  configPath: string = CONFIG_FILE,
  logger: { warn: (msg: string) => void } = console
): PartialConfig {
  if (!isRecord(raw)) {
    throw new ConfigError(`Config error: ${CONFIG_FILE} must be a mapping, got ${describe(raw)}`, { filePath: configPath });
  }

  for (const key of Object.keys(raw)) {
    if (!KNOWN_KEYS.has(key)) {
      logger.warn(`Unknown config key "${key}" ignored`);
    }
  }

  validateVersion(raw.version);

  const config: PartialConfig = {};
  if (typeof raw.version === 'string') config.version = raw.version;

  if (raw.backend !== undefined && raw.backend !== null) {
    if (!isParserBackend(raw.backend)) {
      throw new ConfigError(
        `Config error: backend must be "process" or "worker", got ${JSON.stringify(raw.backend)}`,
        { filePath: configPath }
      );
    }
    config.backend = raw.backend;
  }

  const parseTimeoutMs = readTimeout(raw.parseTimeoutMs, 'parseTimeoutMs', configPath);
  if (parseTimeoutMs !== undefined) config.parseTimeoutMs = parseTimeoutMs;

  if (raw.compiler !== undefined && raw.compiler !== null) {
    config.compiler = validateCompiler(raw.compiler, configPath, logger);
  }

  const workspaceRoot = readPath(raw.workspaceRoot, 'workspaceRoot', configPath);
  if (workspaceRoot !== undefined) config.workspaceRoot = workspaceRoot;

  if (raw.logLevel !== undefined && raw.logLevel !== null) {
    if (!isLogLevel(raw.logLevel)) {
      throw new ConfigError(
        `Config error: logLevel must be one of silent, errors, warnings, info, debug, got ${JSON.stringify(raw.logLevel)}`,
        { filePath: configPath }
      );
    }
    config.logLevel = raw.logLevel;
  }

  const logFile = readPath(raw.logFile, 'logFile', configPath);
  if (logFile !== undefined) config.logFile = logFile;

  return config;
}

function validateCompiler(
  raw: unknown,
  configPath: string,
  logger: { warn: (msg: string) => void }
): Partial<CompilerConfig> {
  if (!isRecord(raw)) {
    throw new ConfigError(`Config error: compiler must be a mapping, got ${describe(raw)}`, { filePath: configPath });
  }

  for (const key of Object.keys(raw)) {
    if (!KNOWN_COMPILER_KEYS.has(key)) {
      logger.warn(`Unknown config key "compiler.${key}" ignored`);
    }
  }

  const compiler: Partial<CompilerConfig> = {};

  const command = readPath(raw.command, 'compiler.command', configPath);
  if (command !== undefined) compiler.command = command;

  if (raw.flags !== undefined && raw.flags !== null) {
    if (!Array.isArray(raw.flags)) {
      throw new ConfigError(`Config error: compiler.flags must be an array, got ${describe(raw.flags)}`, {
        filePath: configPath,
      });
    }
    const flags: string[] = [];
    for (const [i, flag] of raw.flags.entries()) {
      if (typeof flag !== 'string' || !flag.trim()) {
        throw new ConfigError(`Config error: compiler.flags[${i}] must be a non-empty string`, { filePath: configPath });
      }
      flags.push(flag);
    }
    compiler.flags = flags;
  }

  const timeoutMs = readTimeout(raw.timeoutMs, 'compiler.timeoutMs', configPath);
  if (timeoutMs !== undefined) compiler.timeoutMs = timeoutMs;

  return compiler;
}

function readTimeout(value: unknown, key: string, configPath: string): number | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ConfigError(`Config error: ${key} must be a non-negative integer, got ${JSON.stringify(value)}`, {
      filePath: configPath,
    });
  }
  return value;
}

function readPath(value: unknown, key: string, configPath: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new ConfigError(`Config error: ${key} must be a string, got ${describe(value)}`, { filePath: configPath });
  }
  if (!value.trim()) {
    throw new ConfigError(`Config error: ${key} cannot be empty or whitespace-only`, { filePath: configPath });
  }
  return value;
}

/**
 * Validate config version compatibility with the running recordc version.
 * Compares major.minor.patch (pre-release tags are stripped). A missing
 * version passes.
 *
 * @param currentVersion - Override for testing (defaults to RECORDC_VERSION)
 */
export function validateVersion(configVersion: unknown, currentVersion?: string): void {
  if (configVersion === undefined || configVersion === null) {
    return;
  }

  if (typeof configVersion !== 'string') {
    throw new ConfigError(`Config error: version must be a string, got ${describe(configVersion)}`);
  }

  if (!configVersion.trim()) {
    throw new ConfigError('Config error: version cannot be empty');
  }

  const current = currentVersion ?? RECORDC_VERSION;
  const configSchema = getSchemaVersion(configVersion);
  const currentSchema = getSchemaVersion(current);

  if (configSchema !== currentSchema) {
    throw new ConfigError(
      `Config error: config version "${configVersion}" is not compatible with recordc ${current}. Expected "${currentSchema}".`,
      { configVersion, currentVersion: current },
      `Set version: "${currentSchema}" in ${CONFIG_DIR}/${CONFIG_FILE}`
    );
  }
}

/**
 * User values take precedence; missing sections use defaults.
 */
function mergeConfig(defaults: RecordcConfig, user: PartialConfig): RecordcConfig {
  return {
    version: user.version ?? defaults.version,
    backend: user.backend ?? defaults.backend,
    parseTimeoutMs: user.parseTimeoutMs ?? defaults.parseTimeoutMs,
    compiler: {
      command: user.compiler?.command ?? defaults.compiler.command,
      flags: [...(user.compiler?.flags ?? defaults.compiler.flags)],
      timeoutMs: user.compiler?.timeoutMs ?? defaults.compiler.timeoutMs,
    },
    workspaceRoot: user.workspaceRoot ?? defaults.workspaceRoot,
    logLevel: user.logLevel ?? defaults.logLevel,
    logFile: user.logFile ?? defaults.logFile,
  };
}

/**
 * Map config onto builder options. Relative paths resolve against
 * `projectPath`.
 */
export function buildOptionsFromConfig(config: RecordcConfig, projectPath: string, logger?: Logger): BuildOptions {
  return {
    backend: config.backend,
    compiler: config.compiler.command,
    compilerFlags: config.compiler.flags,
    buildTimeoutMs: config.compiler.timeoutMs,
    parseTimeoutMs: config.parseTimeoutMs,
    workspaceRoot: config.workspaceRoot !== undefined ? resolve(projectPath, config.workspaceRoot) : undefined,
    logger,
  };
}
